#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, type ProvisionConfig } from './config/index.js';
import { parseArgs, runProvision, UsageError, USAGE, type ParsedArgs } from './runner.js';
import { ConfigError } from './errors.js';
import { createLogger, setLogger } from './log/index.js';
import { EXIT_INVALID_GRAPH } from './orchestrator/report.js';

async function main(): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (e) {
    if (e instanceof UsageError) {
      console.error(`[error] ${e.message}\n\n${USAGE}`);
      return EXIT_INVALID_GRAPH;
    }
    throw e;
  }
  if (parsed.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  let config: ProvisionConfig;
  try {
    config = loadConfig(parsed.overrides);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`[error] ${e.message}`);
      return EXIT_INVALID_GRAPH;
    }
    throw e;
  }
  setLogger(createLogger({ level: config.logLevel }));

  const { code } = await runProvision(config);
  return code;
}

main().then(code => {
  process.exitCode = code;
}, err => {
  console.error('[fatal]', err);
  process.exit(1);
});
