/**
 * @fileoverview Config Command
 *
 * Usage: docintel config [--json]
 *
 * Prints the resolved configuration with API keys redacted.
 */

import { stringify as stringifyYaml } from 'yaml';
import { redactServiceConfig, resolveDatabasePath } from '../../config/service_config.js';
import { GLOBAL_OPTIONS, loadConfig, parseCommandArgs, printJson, type CommandOptions } from '../context.js';

export async function configCommand(options: CommandOptions): Promise<void> {
  parseCommandArgs('config', { args: options.args, options: GLOBAL_OPTIONS });

  const config = loadConfig(options.context);
  const redacted = redactServiceConfig(config);
  if (options.context.json) {
    printJson(redacted);
    return;
  }
  if (config.storage === 'sqlite') {
    console.log(`# database: ${resolveDatabasePath(config)}`);
  }
  process.stdout.write(stringifyYaml(redacted));
}
