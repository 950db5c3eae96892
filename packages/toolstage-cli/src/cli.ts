#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { Logger, LogLevel } from '@toolstage/core';
import { installCommand } from './commands/install.js';
import { toolsCommand } from './commands/tools.js';
import { setupCommand } from './commands/setup.js';
import { initCommand } from './commands/init.js';
import { hooksInitCommand, hooksRunCommand } from './commands/hooks.js';
import { getCliVersion } from './utils/cli-version.js';

const program = new Command();

program
    .name('toolstage')
    .description('Install staged assistant tooling and run its lifecycle hooks')
    .version(getCliVersion())
    .option('--debug', 'Print debug logging')
    .hook('preAction', (command) => {
        if (command.opts<{ debug?: boolean }>().debug) {
            Logger.setLevel(LogLevel.DEBUG);
        }
    });

program
    .command('install')
    .description('Copy a staged tool into the project root')
    .option('-t, --tool <name>', 'Tool to install (default from toolstage.yml, else web_explorer)')
    .option('-s, --staging <dir>', 'Staging root holding one directory per tool')
    .option('--dry-run', 'Show the copy plan without writing files')
    .addHelpText('after', `
Examples:
  $ toolstage install                  # Install the default tool
  $ toolstage install --dry-run        # Show what would be copied
  $ toolstage install -s vendor/tools  # Use another staging root
    `)
    .action(async (options: { tool?: string; staging?: string; dryRun?: boolean }) => {
        await installCommand(process.cwd(), options);
    });

program
    .command('tools')
    .description('List the tools available in the staging root')
    .option('-s, --staging <dir>', 'Staging root holding one directory per tool')
    .action(async (options: { staging?: string }) => {
        await toolsCommand(process.cwd(), options);
    });

program
    .command('setup')
    .description('Download, verify, extract and set up an archive tool in the staging root')
    .argument('[tool]', 'Archive tool to set up', 'web_search_mcp')
    .option('-s, --staging <dir>', 'Staging root holding the release archive')
    .option('--skip-requirements', 'Do not check the node and npm versions')
    .addHelpText('after', `
Examples:
  $ toolstage setup                    # Set up web_search_mcp
  $ toolstage setup --skip-requirements
    `)
    .action(async (tool: string, options: { staging?: string; skipRequirements?: boolean }) => {
        await setupCommand(process.cwd(), tool, options);
    });

program
    .command('init')
    .description('Write toolstage.yml and wire the hooks into .claude/settings.json')
    .option('--dry-run', 'Show what would be written')
    .option('-f, --force', 'Overwrite an existing toolstage.yml (a .bak copy is kept)')
    .action(async (options: { dryRun?: boolean; force?: boolean }) => {
        await initCommand(process.cwd(), options);
    });

const hooks = program
    .command('hooks')
    .description('Assistant lifecycle hooks');

hooks
    .command('init')
    .description('Add the guard and notify hooks to .claude/settings.json')
    .option('--dry-run', 'Print the resulting settings without writing')
    .option('-f, --force', 'Replace the settings file instead of merging into it')
    .option('--command <cmd>', 'Command the host runs (default: npx toolstage or toolstage)')
    .action(async (options: { dryRun?: boolean; force?: boolean; command?: string }) => {
        await hooksInitCommand(process.cwd(), options);
    });

hooks
    .command('run')
    .description('Run a hook on the event read from stdin (file-guard, command-guard, notify)')
    .argument('<name>', 'Hook name')
    .action(async (name: string) => {
        await hooksRunCommand(process.cwd(), name);
    });

program.parseAsync().catch((error: unknown) => {
    Logger.error(chalk.red('toolstage failed'), error);
    process.exitCode = 1;
});
