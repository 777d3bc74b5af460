/**
 * CliInferenceClient — runs inference by spawning a configured CLI binary.
 *
 * Responsibilities:
 *  - Spawning the child process via child_process.spawn with the prompt on stdin
 *  - Collecting stdout / stderr into buffers
 *  - Mapping exit status and stderr onto transient or permanent errors
 *  - Killing the child when the caller's AbortSignal fires
 */

import { spawn } from 'node:child_process'
import {
  CancelledError,
  ConfigurationError,
  PermanentInferenceError,
  TransientInferenceError,
} from '../../core/errors.js'
import type { RoleName } from '../../core/types.js'
import { maskSecrets } from '../../utils/masking.js'
import { isPlainObject } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { classifyFailure } from '../scheduler/failure-classifier.js'
import type { InferenceClient, InferenceParams, InferenceResponse } from './inference-client.js'

const logger = createLogger('inference:cli')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CliInferenceOptions {
  binary: string
  /** Arguments placed before the generated flags */
  args?: string[]
  /** Default model when params carry none */
  model?: string
  /** `json` expects `{ text|result|output, usage? }` on stdout */
  outputFormat?: 'text' | 'json'
  /** Name of the environment variable that must hold the backend credential */
  apiKeyEnv?: string
  env?: Record<string, string>
  cwd?: string
}

/** Process-level failure carrying an HTTP-like status parsed from stderr */
class ProcessExitError extends Error {
  readonly status: number | undefined
  readonly exitCode: number

  constructor(message: string, exitCode: number, status: number | undefined) {
    super(message)
    this.name = 'ProcessExitError'
    this.exitCode = exitCode
    this.status = status
  }
}

// ---------------------------------------------------------------------------
// CliInferenceClient
// ---------------------------------------------------------------------------

export class CliInferenceClient implements InferenceClient {
  private readonly _options: CliInferenceOptions

  constructor(options: CliInferenceOptions) {
    if (options.binary.trim() === '') {
      throw new ConfigurationError('inference.binary must not be empty')
    }
    this._options = options
  }

  /** Argument vector for one call; the prompt itself goes to stdin */
  buildArgs(params: InferenceParams): string[] {
    const args = [...(this._options.args ?? [])]
    const model = params.model ?? this._options.model
    if (model !== undefined) args.push('--model', model)
    if (params.temperature !== undefined) args.push('--temperature', String(params.temperature))
    if (params.maxTokens !== undefined) args.push('--max-tokens', String(params.maxTokens))
    if (params.systemPrompt !== undefined && params.systemPrompt !== '') {
      args.push('--system-prompt', params.systemPrompt)
    }
    return args
  }

  infer(
    role: RoleName,
    prompt: string,
    params: InferenceParams,
    signal?: AbortSignal,
  ): Promise<InferenceResponse> {
    const apiKeyEnv = this._options.apiKeyEnv
    if (apiKeyEnv !== undefined && apiKeyEnv !== '' && !process.env[apiKeyEnv]) {
      return Promise.reject(
        new PermanentInferenceError(`Credential environment variable ${apiKeyEnv} is not set`, { role }),
      )
    }
    if (signal?.aborted === true) {
      return Promise.reject(new CancelledError(`Inference for role "${role}" cancelled`))
    }

    const args = this.buildArgs(params)
    logger.debug({ role, binary: this._options.binary, args: args.length }, 'Spawning inference process')

    return new Promise<InferenceResponse>((resolve, reject) => {
      const proc = spawn(this._options.binary, args, {
        cwd: this._options.cwd,
        env: { ...process.env, ...this._options.env },
        stdio: ['pipe', 'pipe', 'pipe'],
      })

      let settled = false
      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []

      const finish = (fn: () => void): void => {
        if (settled) return
        settled = true
        signal?.removeEventListener('abort', onAbort)
        fn()
      }

      const onAbort = (): void => {
        proc.kill('SIGTERM')
        finish(() => {
          reject(new CancelledError(`Inference for role "${role}" cancelled`))
        })
      }
      signal?.addEventListener('abort', onAbort, { once: true })

      proc.stdout.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })
      proc.stderr.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      proc.on('error', (err: NodeJS.ErrnoException) => {
        finish(() => {
          if (err.code === 'ENOENT') {
            reject(new PermanentInferenceError(`Inference binary "${this._options.binary}" not found`, { role }))
          } else {
            reject(classifyFailure(err).error)
          }
        })
      })

      proc.on('close', (exitCode: number | null) => {
        const stdout = Buffer.concat(stdoutChunks).toString('utf-8')
        const stderr = Buffer.concat(stderrChunks).toString('utf-8')
        const code = exitCode ?? 1

        finish(() => {
          if (code !== 0) {
            const message = maskSecrets(
              `${this._options.binary} exited with code ${String(code)}: ${stderr.trim() || 'no output'}`,
            )
            reject(classifyFailure(new ProcessExitError(message, code, parseStatus(stderr))).error)
            return
          }
          try {
            resolve(this._parseOutput(stdout))
          } catch (err) {
            reject(err)
          }
        })
      })

      proc.stdin.on('error', (err: Error) => {
        logger.debug({ role, err: err.message }, 'stdin closed early')
      })
      proc.stdin.write(prompt)
      proc.stdin.end()
    })
  }

  private _parseOutput(stdout: string): InferenceResponse {
    const trimmed = stdout.trim()
    if (trimmed === '') {
      throw new TransientInferenceError('Inference process produced no output')
    }
    if (this._options.outputFormat !== 'json') {
      return { text: trimmed }
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(trimmed)
    } catch {
      throw new PermanentInferenceError('Inference process returned malformed JSON output')
    }
    if (!isPlainObject(parsed)) {
      throw new PermanentInferenceError('Inference JSON output is not an object')
    }
    const text = [parsed.text, parsed.result, parsed.output].find(
      (v): v is string => typeof v === 'string',
    )
    if (text === undefined) {
      throw new PermanentInferenceError('Inference JSON output has no text field')
    }
    const response: InferenceResponse = { text }
    if (typeof parsed.model === 'string') response.model = parsed.model
    const usage = parsed.usage
    if (isPlainObject(usage)) {
      if (typeof usage.input_tokens === 'number') response.inputTokens = usage.input_tokens
      if (typeof usage.output_tokens === 'number') response.outputTokens = usage.output_tokens
    }
    return response
  }
}

/** First HTTP-like status mentioned in stderr, e.g. `status: 429` or `HTTP 503` */
export function parseStatus(stderr: string): number | undefined {
  const match = /\b(?:status(?:\s*code)?|HTTP)[\s:=]*([1-5]\d\d)\b/i.exec(stderr)
  return match?.[1] !== undefined ? Number(match[1]) : undefined
}
