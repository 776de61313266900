import { spawn } from 'node:child_process'
import { once } from 'node:events'

export interface RunProcessOptions {
  cwd?: string
  stdin?: string
  timeoutMs?: number
}

export interface ProcessResult {
  exitCode: number
  stdout: string
  stderr: string
  /** Wall-clock runtime in seconds */
  runtime: number
  timedOut: boolean
}

// Shell convention for "command not found"
const SPAWN_FAILURE_EXIT_CODE = 127

export async function runProcess(
  command: string,
  args: string[] = [],
  opts: RunProcessOptions = {}
): Promise<ProcessResult> {
  const { cwd, stdin, timeoutMs } = opts
  const started = Date.now()

  const child = spawn(command, args, {
    cwd,
    stdio: [stdin === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe']
  })

  const stdoutChunks: Buffer[] = []
  const stderrChunks: Buffer[] = []
  const toBuffer = (chunk: Buffer | string) =>
    typeof chunk === 'string' ? Buffer.from(chunk) : chunk
  child.stdout?.on('data', (chunk: Buffer | string) => {
    stdoutChunks.push(toBuffer(chunk))
  })
  child.stderr?.on('data', (chunk: Buffer | string) => {
    stderrChunks.push(toBuffer(chunk))
  })

  if (stdin !== undefined && child.stdin) {
    // The tool may exit before reading all of its input
    child.stdin.on('error', (error: Error) => {
      if (!('code' in error && error.code === 'EPIPE')) {
        stderrChunks.push(Buffer.from(`stdin error: ${error.message}\n`))
      }
    })
    child.stdin.end(stdin)
  }

  // Spawn errors (e.g. ENOENT) are reported, not thrown
  const errorP = once(child, 'error').then(([err]) => ({
    code: SPAWN_FAILURE_EXIT_CODE,
    signal: null,
    spawnError: err instanceof Error ? err.message : String(err)
  }))

  let timedOut = false
  let termTimer: NodeJS.Timeout | undefined
  let killTimer: NodeJS.Timeout | undefined
  if (timeoutMs && timeoutMs > 0) {
    termTimer = setTimeout(() => {
      timedOut = true
      child.kill('SIGTERM')
      killTimer = setTimeout(() => child.kill('SIGKILL'), 5000)
    }, timeoutMs)
  }

  // Prefer 'close' so all stdio is drained
  const closeP = once(child, 'close').then(([code, signal]) => ({
    code: typeof code === 'number' ? code : null,
    signal: typeof signal === 'string' ? signal : null,
    spawnError: undefined
  }))

  let outcome: { code: number | null; signal: string | null; spawnError?: string }
  try {
    outcome = await Promise.race([closeP, errorP])
  } finally {
    if (termTimer) clearTimeout(termTimer)
    if (killTimer) clearTimeout(killTimer)
  }

  let stderr = Buffer.concat(stderrChunks).toString('utf8')
  if (outcome.spawnError) {
    stderr += outcome.spawnError
  }

  return {
    exitCode: outcome.code ?? -1,
    stdout: Buffer.concat(stdoutChunks).toString('utf8'),
    stderr,
    runtime: (Date.now() - started) / 1000,
    timedOut
  }
}
