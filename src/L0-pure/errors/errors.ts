/** Base class for every failure tcap reports to the user. */
export class TcapError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TcapError'
  }
}

/** The source is missing, has no video stream, or ffprobe returned something unreadable. */
export class ProbeError extends TcapError {
  constructor(
    message: string,
    public readonly sourcePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ProbeError'
  }
}

export type StreamKind = 'video' | 'audio'

/**
 * The source codec cannot be reproduced bit-compatibly, so a stream-copy append
 * is impossible. Raised by the still synthesizer and by a forced copy run.
 */
export class UnsupportedCodecError extends TcapError {
  constructor(
    public readonly codecName: string,
    public readonly stream: StreamKind,
    detail?: string,
  ) {
    super(`Unsupported ${stream} codec for stream-copy append: ${codecName}${detail ? ` (${detail})` : ''}`)
    this.name = 'UnsupportedCodecError'
  }
}

export interface ToolFailure {
  /** `ffmpeg` or `ffprobe` */
  tool: string
  /** Full command line as it was launched */
  command: string
  /** Process exit code, or null when the process never exited normally (spawn failure, timeout, signal) */
  exitCode: number | null
  /** Captured diagnostic output */
  stderr: string
  /** Short reason used instead of the exit code in the message */
  reason?: string
}

export class ToolExecutionError extends TcapError {
  readonly tool: string
  readonly command: string
  readonly exitCode: number | null
  readonly stderr: string

  constructor(failure: ToolFailure, options?: { cause?: unknown }) {
    const status = failure.reason ?? (failure.exitCode === null ? 'no exit code' : `exit code ${failure.exitCode}`)
    super(`${failure.tool} failed (${status}): ${failure.command}`, options)
    this.name = 'ToolExecutionError'
    this.tool = failure.tool
    this.command = failure.command
    this.exitCode = failure.exitCode
    this.stderr = failure.stderr
  }

  /** Last `lines` non-empty lines of stderr, for log output. */
  stderrTail(lines = 10): string {
    return this.stderr
      .split(/\r?\n/)
      .filter((line) => line.trim().length > 0)
      .slice(-lines)
      .join('\n')
  }
}

/** Bad user input: duration, CRF, container extension, missing inputs. */
export class ValidationError extends TcapError {
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

export const isTcapError = (error: unknown): error is TcapError => error instanceof TcapError

export const isToolExecutionError = (error: unknown): error is ToolExecutionError =>
  error instanceof ToolExecutionError
