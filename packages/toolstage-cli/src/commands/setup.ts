import chalk from 'chalk';
import ora from 'ora';
import {
    ConfigError,
    EXIT_CONFIG_ERROR,
    EXIT_FAIL,
    InstallError,
    loadConfig,
    setupArchiveTool,
    type ArchiveSetupResult,
    type CommandRunner,
} from '@toolstage/core';

export interface SetupCommandOptions {
    staging?: string;
    skipRequirements?: boolean;
    run?: CommandRunner;
    fetchImpl?: typeof fetch;
}

/**
 * `toolstage setup [tool]`: fetch, verify, extract and set up an
 * archive tool (default web_search_mcp) inside the staging root.
 */
export async function setupCommand(
    cwd: string,
    tool = 'web_search_mcp',
    options: SetupCommandOptions = {},
): Promise<ArchiveSetupResult | undefined> {
    let stagingRoot: string;
    try {
        stagingRoot = options.staging ?? (await loadConfig(cwd)).staging.root;
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(chalk.red(`Error: ${error.message}`));
            process.exitCode = EXIT_CONFIG_ERROR;
            return undefined;
        }
        throw error;
    }

    console.log(chalk.blue(`Setting up ${tool}...`));
    if (!options.skipRequirements) {
        console.log('Checking requirements...');
    }

    const spinner = ora();
    try {
        const result = await setupArchiveTool({
            cwd,
            tool,
            stagingRoot,
            skipRequirements: options.skipRequirements,
            run: options.run,
            fetchImpl: options.fetchImpl,
            onRequirement: check => {
                const line = `  ${check.message}`;
                console.log(check.met ? chalk.green(line) : chalk.red(line));
            },
            onCommand: command => {
                spinner.start(`Running ${command.join(' ')}...`);
            },
        });
        if (spinner.isSpinning) {
            spinner.succeed('Setup commands completed');
        }

        console.log(`  ${result.downloaded ? 'Downloaded' : 'Verified staged'} ${result.archivePath}`);
        console.log(`  ${result.extracted ? 'Extracted to' : 'Already extracted:'} ${result.extractDir}`);
        if (!result.setupRan) {
            console.log('  Setup already completed');
        }
        console.log(chalk.green(`${result.tool} setup complete!`));
        return result;
    } catch (error) {
        if (spinner.isSpinning) {
            spinner.fail();
        }
        if (error instanceof InstallError) {
            console.error(chalk.red(`Setup failed: ${error.message}`));
            process.exitCode = EXIT_FAIL;
            return undefined;
        }
        throw error;
    }
}
