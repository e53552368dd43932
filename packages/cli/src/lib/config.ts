import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { z } from 'zod';

import type { ProviderInput } from 'cta-audit';

/**
 * CLI configuration file names (searched upwards from cwd).
 */
export const CONFIG_FILES = ['.ctaauditrc.json', 'cta-audit.config.js'] as const;

export const REPORT_FORMATS = ['json', 'md', 'sarif', 'console'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const CLI_PROVIDERS = ['openai', 'anthropic', 'gemini', 'ollama', 'mock'] as const;
export type CliProviderName = (typeof CLI_PROVIDERS)[number];

export const CliConfigFileSchema = z
  .object({
    /** Recommendation provider id. Omit to skip external recommendations. */
    provider: z.enum(CLI_PROVIDERS),

    /** Provider API key (or use env vars like `GEMINI_API_KEY`). */
    apiKey: z.string(),

    /** Provider model id (e.g., `gemini-1.5-flash`). */
    model: z.string(),

    /** Provider endpoint override, e.g. a remote Ollama host or an API proxy. */
    providerUrl: z.string().url(),

    /** Label copied into the report. */
    analysisType: z.string(),

    /** Page URL used to resolve root-relative hrefs. */
    baseUrl: z.string().url(),

    format: z.enum(REPORT_FORMATS),

    /** Output file path (defaults to stdout when omitted). */
    output: z.string(),

    /** Minimum passing score for CI-style runs. */
    threshold: z.number().min(0).max(100),

    /** Link checker pool size. */
    concurrency: z.number().int().positive(),

    /** Per-link timeout in milliseconds. */
    timeout: z.number().int().positive(),

    verbose: z.boolean(),

    /** Per-rule overrides, e.g. `{ "cta/element-id": { "enabled": false } }`. */
    rules: z.record(z.object({ enabled: z.boolean().optional() })),
  })
  .partial();

/**
 * User-friendly CLI config shape, merged with CLI flags and env vars.
 */
export type CliConfigFile = z.infer<typeof CliConfigFileSchema>;

/**
 * Find a config file by walking up from the starting directory.
 */
export function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);
  while (true) {
    for (const name of CONFIG_FILES) {
      const full = path.join(dir, name);
      if (existsSync(full)) return full;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Load config from disk. Supports:
 * - `.ctaauditrc.json`
 * - `cta-audit.config.js` (default export)
 */
export async function loadConfigFile(filePath: string): Promise<CliConfigFile> {
  if (filePath.endsWith('.json')) {
    const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
    return parseConfig(raw, filePath);
  }

  if (filePath.endsWith('.js')) {
    const mod: unknown = await import(pathToFileURL(filePath).href);
    const exported = mod !== null && typeof mod === 'object' && 'default' in mod ? mod.default : mod;
    return parseConfig(exported ?? {}, filePath);
  }

  return {};
}

function parseConfig(raw: unknown, source: string): CliConfigFile {
  const parsed = CliConfigFileSchema.safeParse(raw);
  if (parsed.success) return parsed.data;

  const problems = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
  throw new Error(`Invalid config in ${source}: ${problems.join('; ')}`);
}

/**
 * Merge config objects with precedence: base < overrides.
 *
 * `undefined` values in `overrides` never clear a value from `base`.
 */
export function mergeConfig(base: CliConfigFile, overrides: CliConfigFile): CliConfigFile {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );

  return {
    ...base,
    ...defined,
    rules: {
      ...(base.rules ?? {}),
      ...(overrides.rules ?? {}),
    },
  };
}

const PROVIDER_KEY_VARS: Partial<Record<CliProviderName, string>> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
};

/**
 * Final CLI settings: env vars < config file < flags.
 *
 * The API key falls back to `CTA_AUDIT_API_KEY`, then to the selected
 * provider's own variable (`OPENAI_API_KEY`, `ANTHROPIC_API_KEY`,
 * `GEMINI_API_KEY`).
 */
export function resolveCliConfig(input: {
  file: CliConfigFile;
  flags: CliConfigFile;
  env: NodeJS.ProcessEnv;
}): CliConfigFile {
  const { env } = input;
  const merged = mergeConfig(input.file, input.flags);

  const provider = merged.provider ?? toProviderName(env.CTA_AUDIT_PROVIDER);
  const keyVar = provider ? PROVIDER_KEY_VARS[provider] : undefined;
  const apiKey = merged.apiKey ?? env.CTA_AUDIT_API_KEY ?? (keyVar ? env[keyVar] : undefined);
  const model = merged.model ?? env.CTA_AUDIT_MODEL;

  return {
    ...merged,
    ...(provider ? { provider } : {}),
    ...(apiKey ? { apiKey } : {}),
    ...(model ? { model } : {}),
  };
}

/**
 * Validate a provider id from a flag or env var.
 */
export function toProviderName(value: string | undefined): CliProviderName | undefined {
  if (value === undefined || value === '') return undefined;
  const match = CLI_PROVIDERS.find((name) => name === value.toLowerCase());
  if (!match) {
    throw new Error(`Unknown provider "${value}". Expected one of: ${CLI_PROVIDERS.join(', ')}`);
  }
  return match;
}

/**
 * Validate a report format; `markdown` is accepted for `md`.
 */
export function toReportFormat(value: string | undefined): ReportFormat | undefined {
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase() === 'markdown' ? 'md' : value.toLowerCase();
  const match = REPORT_FORMATS.find((format) => format === normalized);
  if (!match) {
    throw new Error(`Unknown format "${value}". Expected one of: ${REPORT_FORMATS.join(', ')}`);
  }
  return match;
}

/**
 * Provider settings for the audit API, or `undefined` when no provider is set.
 */
export function toProviderInput(cfg: CliConfigFile): ProviderInput | undefined {
  if (!cfg.provider) return undefined;
  return {
    name: cfg.provider,
    apiKey: cfg.apiKey,
    model: cfg.model,
    baseUrl: cfg.providerUrl,
  };
}
