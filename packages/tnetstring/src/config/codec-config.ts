import { logLevelNames } from "@tnetkit/logger"
import { z } from "zod"
import {
  DEFAULT_MAX_DEPTH,
  type EngineOptions,
  MAX_LENGTH_CEILING,
} from "../core/engine/engine-options"

export const ENV_PREFIX = "TNETSTRING_"

const flag = z.union([z.boolean(), z.stringbool()])

export const codecConfigSchema = z.object({
  MAX_LENGTH: z.coerce.number().int().min(0).max(MAX_LENGTH_CEILING).default(MAX_LENGTH_CEILING),
  MAX_DEPTH: z.coerce.number().int().min(1).default(DEFAULT_MAX_DEPTH),
  MAX_OUTPUT_BYTES: z.coerce.number().int().positive().optional(),
  LEGACY_NUMBERS: flag.default(false),
  LOG_LEVEL: z.enum(logLevelNames).default("warn"),
})

export type CodecSettings = z.infer<typeof codecConfigSchema>

export type CodecSettingKey = keyof CodecSettings & string

export type LoadCodecConfigOptions = {
  /** Environment to read `TNETSTRING_*` variables from. Default: process.env */
  env?: Record<string, string | undefined>
  /** Values applied after the environment, keyed without the prefix. */
  overrides?: Partial<Record<CodecSettingKey, unknown>>
}

/**
 * Validated codec settings with provenance for each key.
 */
export class CodecConfig {
  constructor(
    private readonly data: Readonly<CodecSettings>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<CodecSettings> {
    return this.data
  }

  /** Which source supplied a key: "env", "overrides" or "default". */
  explain(key: CodecSettingKey): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))].filter((s) => s !== "default")
  }

  /** Prefixed keys that the schema does not know, typically typos. */
  unknownKeys(): string[] {
    const known = new Set(Object.keys(codecConfigSchema.shape))
    return [...this.mergedKeys].filter((k) => !known.has(k))
  }

  toEngineOptions(): EngineOptions {
    return {
      maxLength: this.data.MAX_LENGTH,
      maxDepth: this.data.MAX_DEPTH,
      legacyNumbers: this.data.LEGACY_NUMBERS,
      ...(this.data.MAX_OUTPUT_BYTES !== undefined && {
        maxOutputBytes: this.data.MAX_OUTPUT_BYTES,
      }),
    }
  }
}

/**
 * Load codec settings from `TNETSTRING_*` environment variables, then
 * overrides. Later sources win.
 *
 * @example
 * ```ts
 * const config = loadCodecConfig({ env: { TNETSTRING_MAX_DEPTH: "16" } })
 * config.value.MAX_DEPTH     // 16
 * config.explain("MAX_DEPTH") // "env"
 * ```
 */
export function loadCodecConfig(options: LoadCodecConfigOptions = {}): CodecConfig {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  const sources: [string, Record<string, unknown>][] = [
    ["env", stripPrefix(options.env ?? process.env)],
    ["overrides", { ...options.overrides }],
  ]

  for (const [name, values] of sources) {
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = name
      }
    }
  }

  const result = codecConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new Error(`Codec configuration validation failed:\n${z.prettifyError(result.error)}`)
  }

  return new CodecConfig(result.data, provenance, new Set(Object.keys(merged)))
}

function stripPrefix(env: Record<string, string | undefined>): Record<string, unknown> {
  const filtered: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX)) {
      filtered[key.slice(ENV_PREFIX.length)] = value
    }
  }

  return filtered
}
