import { existsSync } from 'node:fs';
import type { AnalysisConfig } from '../types.js';
import { DEFAULT_REGULAR_APR, SAMPLE_PLANS } from '../config/defaults.js';
import { loadConfig } from '../config/loader.js';
import { ConfigError } from '../errors.js';
import { analyze } from '../analyzers/comparison.js';
import { renderAnalysis } from '../formatters/table.js';
import { renderMarkdownReport } from '../formatters/markdown.js';
import { theme } from '../formatters/colors.js';
import { num } from './options.js';

interface AnalyzeOptions {
  markdown?: boolean;
  regularApr?: string;
}

export function analyzeCommand(configPath: string | undefined, opts: AnalyzeOptions): void {
  let config: AnalysisConfig;
  if (configPath) {
    if (!existsSync(configPath)) {
      throw new ConfigError(`Configuration file ${configPath} not found`);
    }
    config = loadConfig(configPath);
    if (!opts.markdown) console.log(theme.muted(`Loading configuration from ${configPath}`));
  } else {
    config = { regularApr: DEFAULT_REGULAR_APR, paymentPlans: SAMPLE_PLANS };
    if (!opts.markdown) console.log(theme.muted('Running with the sample plans...'));
  }

  const regularApr = num(opts.regularApr, config.regularApr);
  const results = config.paymentPlans.map((plan) => analyze(plan, regularApr));

  if (opts.markdown) {
    console.log(renderMarkdownReport(results));
    return;
  }

  results.forEach((result, i) => {
    console.log(renderAnalysis(result, i + 1));
  });
  console.log('');
}
