import { createInterface } from "node:readline/promises"
import type { Readable, Writable } from "node:stream"
import { isAbortError, raceAbort } from "@mpusweep/clock"
import { AbortedError } from "@mpusweep/errors"
import { formatBytes } from "../../core/units/bytes"
import type { ConfirmationPrompt, ConfirmationSummary } from "../../ports/collaborators"

export const CONFIRMATION_QUESTION = "Proceed with deletion? [y/N] "

export function formatSummary(summary: ConfirmationSummary): string {
  const lines = [
    `About to delete ${summary.uploads} incomplete uploads (${formatBytes(summary.totalSize)}) in ${summary.buckets} buckets`,
  ]

  for (const [bucket, count] of Object.entries(summary.perBucket ?? {})) {
    lines.push(`  ${bucket}: ${count}`)
  }

  return `${lines.join("\n")}\n`
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase()
  return normalized === "y" || normalized === "yes"
}

export type ReadlineConfirmationPromptDeps = {
  input: Readable
  output: Writable
}

/** Asks on a terminal-like stream pair. A closed input counts as no. */
export class ReadlineConfirmationPrompt implements ConfirmationPrompt {
  constructor(private readonly deps: ReadlineConfirmationPromptDeps) {}

  async confirm(summary: ConfirmationSummary, signal?: AbortSignal): Promise<boolean> {
    this.deps.output.write(formatSummary(summary))

    const rl = createInterface({ input: this.deps.input, output: this.deps.output, terminal: false })
    const closed = new Promise<string>((resolve) => rl.once("close", () => resolve("")))

    try {
      const answer = await raceAbort(Promise.race([rl.question(CONFIRMATION_QUESTION), closed]), signal)
      return isAffirmative(answer)
    } catch (error) {
      if (signal?.aborted) throw AbortedError.fromSignal(signal, "confirmation")
      // Some Node releases reject a pending question when the input closes.
      if (isAbortError(error)) return false
      throw error
    } finally {
      rl.close()
    }
  }
}

export function createStdioConfirmationPrompt(): ConfirmationPrompt {
  return new ReadlineConfirmationPrompt({ input: process.stdin, output: process.stderr })
}
