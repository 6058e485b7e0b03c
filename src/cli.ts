#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { describeConfigError, loadConfig, validateConfig } from './config/loader.js';
import type { Config } from './config/schema.js';
import { getDecisionPolicy, getMaxTimeout } from './config/policy.js';

const pkg = z.object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8')));

program
  .name('hitl-rendezvous')
  .description('Human-in-the-loop decision coordinator')
  .version(pkg.version);

function exitInvalid(errors: string[]): never {
  console.error('❌ Config is invalid:');
  for (const err of errors) {
    console.error(`  - ${err}`);
  }
  process.exit(1);
}

// validate
program
  .command('validate')
  .description('Validate a config file')
  .argument('<config>', 'Path to config file')
  .action((configFile: string) => {
    const configPath = resolve(configFile);
    const result = validateConfig(configPath);
    if (result.valid) {
      console.log('✅ Config is valid');
    } else {
      exitInvalid(result.errors ?? []);
    }
  });

// policy
program
  .command('policy')
  .description('Show the effective timeout and default outcome for a policy key')
  .argument('<config>', 'Path to config file')
  .argument('[key]', 'Policy key, e.g. a tool name')
  .action((configFile: string, key: string | undefined) => {
    let config: Config;
    try {
      config = loadConfig(resolve(configFile));
    } catch (err) {
      exitInvalid(describeConfigError(err));
    }
    const policy = getDecisionPolicy(config, key);
    console.log(JSON.stringify({
      key: key ?? null,
      timeout: policy.timeout,
      defaultOutcome: policy.defaultOutcome,
      maxTimeout: getMaxTimeout(config),
    }, null, 2));
  });

program.parse();
