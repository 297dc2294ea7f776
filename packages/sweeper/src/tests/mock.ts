import type { Logger } from "@mpusweep/logger"
import { type MockProxy, mock } from "vitest-mock-extended"

export type Mock<T> = MockProxy<T>

/** Logger mock whose children are the same mock, so one handle sees every entry. */
export function mockLogger(): Mock<Logger> {
  const logger = mock<Logger>()
  logger.child.mockReturnValue(logger)

  return logger
}
