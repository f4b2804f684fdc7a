import { spawnSync } from "node:child_process"

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024

export interface CommandResult {
  readonly status: number | null
  readonly stdout: Buffer
  readonly stderr: Buffer
  readonly error?: Error
}

export interface CommandRunOptions {
  readonly env?: NodeJS.ProcessEnv
  readonly input?: Buffer
}

/** Runs a process to completion and returns its exit status and captured output. */
export type CommandRunner = (command: string, args: ReadonlyArray<string>, options?: CommandRunOptions) => CommandResult

export const spawnCommandRunner: CommandRunner = (command, args, options = {}) => {
  const result = spawnSync(command, [...args], {
    env: options.env,
    input: options.input,
    maxBuffer: MAX_OUTPUT_BYTES,
    stdio: ["pipe", "pipe", "pipe"],
  })
  return {
    status: result.status,
    stdout: result.stdout ?? Buffer.alloc(0),
    stderr: result.stderr ?? Buffer.alloc(0),
    error: result.error,
  }
}

export const describeExit = (command: string, result: CommandResult): string =>
  result.status == null ? `${command} was terminated` : `${command} exited with code ${result.status}`
