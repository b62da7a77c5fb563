#!/usr/bin/env node
import { Command } from 'commander';
import { APP_VERSION, CLI_BIN_NAME } from './config/branding.js';
import { registerFreeze } from './commands/freeze.js';
import { registerInit } from './commands/init.js';
import { registerPush } from './commands/push.js';
import { registerReset } from './commands/reset.js';
import { registerStatus } from './commands/status.js';
import { registerSwitch } from './commands/switch.js';
import { registerSync } from './commands/sync.js';
import { registerVersion } from './commands/version.js';

const program = new Command();

program
  .name(CLI_BIN_NAME)
  .description('Run git operations across every repository in a manifest')
  .version(APP_VERSION);

registerInit(program);
registerStatus(program);
registerSync(program);
registerPush(program);
registerSwitch(program);
registerReset(program);
registerFreeze(program);
registerVersion(program);

await program.parseAsync();
