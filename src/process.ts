import { spawn } from 'node:child_process'
import { accessSync, constants as fsConstants } from 'node:fs'
import path from 'node:path'

const STDERR_LIMIT = 8192

function isExecutable(filePath: string): boolean {
  try {
    accessSync(filePath, fsConstants.X_OK)
    return true
  } catch {
    return false
  }
}

export function resolveExecutableInPath(
  binary: string,
  env: Record<string, string | undefined>
): string | null {
  if (!binary) return null
  if (path.isAbsolute(binary)) {
    return isExecutable(binary) ? binary : null
  }
  const pathEnv = env.PATH ?? ''
  for (const entry of pathEnv.split(path.delimiter)) {
    if (!entry) continue
    const candidate = path.join(entry, binary)
    if (isExecutable(candidate)) return candidate
  }
  return null
}

export function resolveToolPath(
  binary: string,
  env: Record<string, string | undefined>,
  {
    explicitEnvKey,
    configured,
  }: { explicitEnvKey?: string; configured?: string | null } = {}
): string | null {
  const explicit = explicitEnvKey ? env[explicitEnvKey]?.trim() : ''
  if (explicit) return resolveExecutableInPath(explicit, env)
  const fromConfig = configured?.trim()
  if (fromConfig) return resolveExecutableInPath(fromConfig, env)
  return resolveExecutableInPath(binary, env)
}

/** Spawns `command`, optionally piping `input` to stdin, and collects stdout as bytes. */
export async function runProcessCaptureBuffer({
  command,
  args,
  timeoutMs,
  errorLabel,
  input,
}: {
  command: string
  args: string[]
  timeoutMs: number
  errorLabel: string
  input?: Uint8Array | null
}): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: [input ? 'pipe' : 'ignore', 'pipe', 'pipe'] })
    const chunks: Buffer[] = []
    let stderr = ''
    let settled = false

    const finish = (error: Error | null, output?: Buffer) => {
      if (settled) return
      settled = true
      clearTimeout(timeout)
      if (error) reject(error)
      else resolve(output ?? Buffer.alloc(0))
    }

    const timeout = setTimeout(() => {
      proc.kill('SIGKILL')
      finish(new Error(`${errorLabel} timed out`))
    }, timeoutMs)

    if (proc.stdout) {
      proc.stdout.on('data', (chunk: Buffer) => {
        chunks.push(chunk)
      })
    }
    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        if (stderr.length < STDERR_LIMIT) {
          stderr += chunk
        }
      })
    }
    if (input && proc.stdin) {
      // EPIPE when the tool exits before reading everything; the exit code reports the failure.
      proc.stdin.on('error', () => {})
      proc.stdin.end(Buffer.from(input))
    }

    proc.on('error', (error) => {
      finish(error)
    })

    proc.on('close', (code) => {
      if (code === 0) {
        finish(null, Buffer.concat(chunks))
        return
      }
      const suffix = stderr.trim() ? `: ${stderr.trim()}` : ''
      finish(new Error(`${errorLabel} exited with code ${code}${suffix}`))
    })
  })
}
