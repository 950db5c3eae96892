import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import {
    CONFIG_FILE,
    DEFAULT_CONFIG_YAML,
    EXIT_FAIL,
    errorMessage,
    getConfigPath,
} from '@toolstage/core';
import { writeHookSettings } from './hooks.js';

export interface InitOptions {
    dryRun?: boolean;
    force?: boolean;
}

async function writeConfig(cwd: string, force: boolean): Promise<'created' | 'replaced' | 'skipped'> {
    const configPath = getConfigPath(cwd);
    if (await fs.pathExists(configPath)) {
        if (!force) {
            console.log(chalk.yellow(`  SKIP ${CONFIG_FILE} (already exists, use --force to overwrite)`));
            return 'skipped';
        }
        await fs.copy(configPath, `${configPath}.bak`);
        console.log(chalk.dim(`  BACKUP ${CONFIG_FILE}.bak`));
        await fs.writeFile(configPath, DEFAULT_CONFIG_YAML, 'utf-8');
        console.log(chalk.green(`  REPLACE ${CONFIG_FILE}`));
        return 'replaced';
    }
    await fs.writeFile(configPath, DEFAULT_CONFIG_YAML, 'utf-8');
    console.log(chalk.green(`  CREATE ${CONFIG_FILE}`));
    return 'created';
}

/**
 * `toolstage init`: write toolstage.yml and wire the hooks.
 */
export async function initCommand(cwd: string, options: InitOptions = {}): Promise<void> {
    console.log(chalk.bold.blue('\nInitializing toolstage\n'));

    try {
        if (options.dryRun) {
            console.log(chalk.cyan(`Dry run: would write ${path.join(cwd, CONFIG_FILE)}`));
            await writeHookSettings(cwd, { dryRun: true });
            return;
        }
        await writeConfig(cwd, !!options.force);
        await writeHookSettings(cwd, {});
    } catch (error) {
        console.error(chalk.red(`Init failed: ${errorMessage(error)}`));
        process.exitCode = EXIT_FAIL;
        return;
    }

    console.log(chalk.cyan('\nNext steps:'));
    console.log(chalk.dim(`  Edit ${CONFIG_FILE} to set protected files, blocked flags and notifications.`));
    console.log(chalk.dim('  Run `toolstage install` to copy the staged tool into this project.\n'));
}
