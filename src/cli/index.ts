#!/usr/bin/env node
import { program, type Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import {
  snapshotCreateCommand,
  snapshotDeleteCommand,
  snapshotListCommand,
  snapshotRevertCommand,
} from './commands/snapshot.js';
import { execCommand } from './commands/exec.js';
import { waitCommand } from './commands/wait.js';
import { copyCommand } from './commands/copy.js';
import { challengeListCommand, challengeRunCommand, challengeValidateCommand } from './commands/challenge.js';
import type { GlobalOptions } from './shared.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

program
  .name('labkeeper')
  .description('Snapshots, SSH and challenge validation for libvirt lab VMs')
  .version(packageJson.version)
  .option('--config <file>', 'Settings file (default: ./labkeeper.yaml when present)')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print virsh commands before execution');

/**
 * Merge the global options into command-level options.
 * Supports both positions:
 *   labkeeper --json snapshot list vm    (parent parses --json)
 *   labkeeper snapshot list vm --json    (subcommand parses --json)
 */
function withGlobalOpts<T extends GlobalOptions>(opts: T): T {
  const globalOpts = program.opts<GlobalOptions>();
  return {
    ...opts,
    config: opts.config ?? globalOpts.config,
    json: opts.json === true || globalOpts.json === true,
    verbose: opts.verbose === true || globalOpts.verbose === true,
  };
}

const sshOptions = (command: Command): Command =>
  command
    .option('--user <name>', 'SSH user (default from settings)')
    .option('--key <path>', 'SSH private key (default from settings)')
    .option('--port <port>', 'SSH port (default from settings)');

const snapshot = program.command('snapshot').description('Manage external disk-only snapshots');

snapshot
  .command('create <vm> <name>')
  .description('Create a snapshot')
  .option('--description <text>', 'Snapshot description')
  .option('--no-freeze', 'Skip the guest filesystem freeze')
  .option('--json', 'Output as JSON')
  .action((vm: string, name: string, opts) => snapshotCreateCommand(vm, name, withGlobalOpts(opts)));

snapshot
  .command('revert <vm> <name>')
  .description('Revert a VM to a snapshot')
  .option('--json', 'Output as JSON')
  .action((vm: string, name: string, opts) => snapshotRevertCommand(vm, name, withGlobalOpts(opts)));

snapshot
  .command('delete <vm> <name>')
  .description('Delete snapshot metadata (overlay files stay on disk)')
  .option('--json', 'Output as JSON')
  .action((vm: string, name: string, opts) => snapshotDeleteCommand(vm, name, withGlobalOpts(opts)));

snapshot
  .command('list <vm>')
  .description('List snapshots of a VM')
  .option('--json', 'Output as JSON')
  .action((vm: string, opts) => snapshotListCommand(vm, withGlobalOpts(opts)));

sshOptions(
  program
    .command('exec <host> <command>')
    .description('Run a command on a VM over SSH')
    .option('--tty', 'Allocate a pseudo-terminal (editors are closed automatically)')
    .option('--timeout <seconds>', 'Command timeout')
    .option('--json', 'Output as JSON')
).action((host: string, command: string, opts) => execCommand(host, command, withGlobalOpts(opts)));

sshOptions(
  program
    .command('wait <host>')
    .description('Wait until a VM accepts SSH connections')
    .option('--timeout <seconds>', 'Give up after this long')
    .option('--interval <seconds>', 'Pause between attempts')
    .option('--json', 'Output as JSON')
).action((host: string, opts) => waitCommand(host, withGlobalOpts(opts)));

sshOptions(
  program
    .command('copy <host> <local> <remote>')
    .description('Upload a file to a VM over SFTP')
    .option('--create-dirs', 'Create missing remote directories')
    .option('--json', 'Output as JSON')
).action((host: string, local: string, remote: string, opts) => copyCommand(host, local, remote, withGlobalOpts(opts)));

const challenge = program.command('challenge').description('Validate and run challenges');

challenge
  .command('validate <file>')
  .description('Validate a challenge file without contacting any VM')
  .option('--json', 'Output as JSON')
  .action((file: string, opts) => challengeValidateCommand(file, withGlobalOpts(opts)));

challenge
  .command('list')
  .description('List challenges in the configured directory')
  .option('--json', 'Output as JSON')
  .action((opts) => challengeListCommand(withGlobalOpts(opts)));

sshOptions(
  challenge
    .command('run <id>')
    .description('Set up, validate and score a challenge')
    .option('--host <address>', 'VM address (default: looked up from --vm)')
    .option('--vm <name>', 'Domain to protect with a safety snapshot')
    .option('--simulate', 'Run the challenge\'s simulated learner action first')
    .option('--hints <count>', 'Number of hints revealed')
    .option('--keep-snapshot', 'Keep the VM state and the safety snapshot')
    .option('--timeout <seconds>', 'Per-command timeout')
    .option('--json', 'Output as JSON')
).action((id: string, opts) => challengeRunCommand(id, withGlobalOpts(opts)));

program.parse();
