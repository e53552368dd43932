#!/usr/bin/env node
import { readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { Command } from 'commander';
import ora from 'ora';

import { CtaAuditor, isAuditFailure, toAuditConfig } from 'cta-audit';
import { createBuiltinRegistry, getRuleMetadata } from '@cta-audit/rules';

import { compareWith, formatComparison, parseReportSummary } from './lib/compare.js';
import {
  findConfigFile,
  loadConfigFile,
  resolveCliConfig,
  toProviderInput,
  toProviderName,
  toReportFormat,
} from './lib/config.js';
import type { CliConfigFile } from './lib/config.js';
import { exitCodeFor, renderReport } from './lib/render.js';
import { FileSnapshotProvider, readSnapshotFile } from './lib/snapshotFile.js';

const DEFAULT_THRESHOLD = 70;

interface AuditCommandOptions {
  url?: string;
  analysisType?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
  providerUrl?: string;
  format?: string;
  output?: string;
  threshold?: number;
  concurrency?: number;
  timeout?: number;
  baseUrl?: string;
  verbose?: boolean;
  color?: boolean;
}

async function main(): Promise<void> {
  const cwd = process.cwd();
  const cfgPath = findConfigFile(cwd);
  const fileConfig = cfgPath ? await loadConfigFile(cfgPath) : {};

  const program = new Command();
  program
    .name('cta-audit')
    .description('Audit call-to-action elements captured from a web page')
    .version('0.1.0');

  program
    .command('audit')
    .argument('<snapshot>', 'Snapshot JSON: { "url", "elements" } or an element array')
    .option('--url <url>', 'Page URL (defaults to the url stored in the snapshot)')
    .option('--analysis-type <label>', 'Label copied into the report')
    .option('--provider <provider>', 'Recommendation provider: openai|anthropic|gemini|ollama|mock')
    .option('--model <model>', 'Model name')
    .option('--api-key <key>', 'API key')
    .option('--provider-url <url>', 'Provider endpoint (e.g. a remote Ollama host)')
    .option('--format <format>', 'Output format: json|md|sarif|console')
    .option('--output <file>', 'Output file path')
    .option('--threshold <n>', 'Fail below this score', parseNumber)
    .option('--concurrency <n>', 'Parallel link checks', parseNumber)
    .option('--timeout <ms>', 'Per-link timeout in milliseconds', parseNumber)
    .option('--base-url <url>', 'Resolve root-relative hrefs against this URL')
    .option('--verbose', 'Verbose output')
    .option('--no-color', 'Disable ANSI colours in console output')
    .action(async (snapshotPath: string, options: AuditCommandOptions) => {
      const cfg = resolveCliConfig({
        file: fileConfig,
        flags: {
          analysisType: options.analysisType,
          provider: toProviderName(options.provider),
          model: options.model,
          apiKey: options.apiKey,
          providerUrl: options.providerUrl,
          baseUrl: options.baseUrl,
          format: toReportFormat(options.format),
          output: options.output,
          threshold: options.threshold,
          concurrency: options.concurrency,
          timeout: options.timeout,
          verbose: options.verbose,
        },
        env: process.env,
      });

      const resolvedSnapshot = path.resolve(cwd, snapshotPath);
      const url = options.url ?? (await readSnapshotFile(resolvedSnapshot)).url;
      if (!url) {
        console.error('Missing page URL. Pass --url or store "url" in the snapshot file.');
        process.exit(2);
      }

      const auditor = new CtaAuditor(
        toAuditConfig({
          analysisType: cfg.analysisType,
          provider: toProviderInput(cfg),
          rules: cfg.rules,
          concurrency: cfg.concurrency,
          timeoutMs: cfg.timeout,
          links: cfg.baseUrl ? { baseUrl: cfg.baseUrl } : undefined,
        }),
      );

      const spinner = ora('Loading snapshot...').start();
      let analysed = 0;

      auditor.on('start', () => {
        spinner.text = 'Checking links...';
      });
      auditor.on('links:progress', (p: { completed: number; total: number }) => {
        spinner.text = `Checking links... (${p.completed}/${p.total})`;
      });
      auditor.on('links:complete', (s: { checked: number; skipped: number }) => {
        spinner.text = 'Scoring CTAs...';
        if (cfg.verbose) spinner.info(`Links checked: ${s.checked}, skipped: ${s.skipped}`).start();
      });
      auditor.on('element:complete', () => {
        analysed += 1;
        if (cfg.verbose) spinner.text = `Scoring CTAs... (${analysed})`;
      });
      auditor.on('ai:error', (error: unknown) => {
        spinner.warn('Recommendation service failed; continuing without it').start();
        if (cfg.verbose) console.error(error);
      });

      const outcome = await auditor.audit(url, new FileSnapshotProvider(resolvedSnapshot));
      if (isAuditFailure(outcome)) {
        spinner.fail(outcome.error);
        process.exit(2);
      }

      spinner.succeed(`Audit complete. Score: ${outcome.score} (${outcome.totalCtas} CTAs)`);

      const output = renderReport(outcome, cfg.format ?? 'console', {
        noColor: options.color === false,
      });

      if (cfg.output) {
        writeFileSync(path.resolve(cwd, cfg.output), output, 'utf8');
      } else {
        process.stdout.write(output + '\n');
      }

      process.exit(exitCodeFor(outcome.score, cfg.threshold ?? DEFAULT_THRESHOLD));
    });

  program
    .command('rules')
    .argument('[ruleId]', 'Rule id to inspect')
    .action((ruleId?: string) => {
      const registry = createBuiltinRegistry();
      if (ruleId) {
        const rule = registry.get(ruleId);
        if (!rule) {
          console.error(`Unknown rule: ${ruleId}`);
          process.exit(2);
        }
        console.log(`${rule.id} (${rule.category}, up to ${rule.severity})`);
        console.log(rule.description);
        return;
      }

      for (const rule of getRuleMetadata(registry)) {
        console.log(`${rule.id}\t${rule.category}\t${rule.severity}\t${rule.description}`);
      }
    });

  program
    .command('init')
    .option('--path <file>', 'Where to write config', '.ctaauditrc.json')
    .action((opts: { path: string }) => {
      const outPath = path.resolve(cwd, opts.path);
      const template: CliConfigFile = {
        provider: 'gemini',
        model: 'gemini-1.5-flash',
        format: 'md',
        output: 'cta-audit-report.md',
        threshold: DEFAULT_THRESHOLD,
        concurrency: 5,
        timeout: 10_000,
        rules: {},
      };
      writeFileSync(outPath, JSON.stringify(template, null, 2), 'utf8');
      console.log(`Wrote ${outPath}`);
    });

  program
    .command('compare')
    .argument('<previous>', 'Previous JSON report')
    .argument('<current>', 'Current JSON report')
    .action((previousPath: string, currentPath: string) => {
      const prev = parseReportSummary(readJson(path.resolve(cwd, previousPath)), previousPath);
      const curr = parseReportSummary(readJson(path.resolve(cwd, currentPath)), currentPath);
      for (const line of formatComparison(compareWith(prev, curr))) console.log(line);
      process.exit(0);
    });

  await program.parseAsync(process.argv);
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new Error(`Not a number: ${value}`);
  return n;
}

function readJson(filePath: string): unknown {
  return JSON.parse(readFileSync(filePath, 'utf8'));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(2);
});
