import chalk from 'chalk';
import {
    ConfigError,
    EXIT_CONFIG_ERROR,
    EXIT_FAIL,
    InstallError,
    describeAsset,
    installTool,
    loadConfig,
    type InstallResult,
} from '@toolstage/core';

export interface InstallCommandOptions {
    tool?: string;
    staging?: string;
    dryRun?: boolean;
}

function printDryRun(result: InstallResult): void {
    console.log(chalk.cyan(`\nDry run: ${result.tool} would copy:\n`));
    for (const step of result.steps) {
        console.log(`  ${step.asset.source} -> ${describeAsset(step.asset)}`);
        if (step.asset.executable) {
            console.log(chalk.dim(`    (${step.asset.executable} made executable)`));
        }
    }
    console.log('');
}

/**
 * `toolstage install`: copy a staged tool into the project root.
 * Sets a non-zero exit code on the first failed step.
 */
export async function installCommand(cwd: string, options: InstallCommandOptions = {}): Promise<InstallResult | undefined> {
    let stagingRoot: string;
    let tool: string;
    try {
        const config = await loadConfig(cwd);
        stagingRoot = options.staging ?? config.staging.root;
        tool = options.tool ?? config.staging.default_tool;
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(chalk.red(`Error: ${error.message}`));
            process.exitCode = EXIT_CONFIG_ERROR;
            return undefined;
        }
        throw error;
    }

    if (!options.dryRun) {
        console.log(chalk.blue(`Setting up ${tool} tool...`));
    }

    try {
        const result = await installTool({
            cwd,
            tool,
            stagingRoot,
            dryRun: options.dryRun,
            onStep: step => {
                if (!options.dryRun) {
                    console.log(`  - Copied ${describeAsset(step.asset)}`);
                }
            },
        });

        if (result.dryRun) {
            printDryRun(result);
        } else {
            console.log(chalk.green(`${result.tool} tool setup complete!`));
        }
        return result;
    } catch (error) {
        if (error instanceof InstallError) {
            console.error(chalk.red(`Install failed: ${error.message}`));
            process.exitCode = EXIT_FAIL;
            return undefined;
        }
        throw error;
    }
}
