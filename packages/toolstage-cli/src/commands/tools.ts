import chalk from 'chalk';
import {
    ConfigError,
    EXIT_CONFIG_ERROR,
    getToolManifest,
    listKnownTools,
    listStagedTools,
    loadConfig,
    resolveStagingRoot,
    type Config,
} from '@toolstage/core';

export async function toolsCommand(cwd: string, options: { staging?: string } = {}): Promise<string[]> {
    let config: Config;
    try {
        config = await loadConfig(cwd);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(chalk.red(`Error: ${error.message}`));
            process.exitCode = EXIT_CONFIG_ERROR;
            return [];
        }
        throw error;
    }
    const stagingRoot = resolveStagingRoot(cwd, options.staging ?? config.staging.root);
    const staged = await listStagedTools(stagingRoot);

    if (staged.length === 0) {
        console.log(chalk.yellow(`No installable tools staged in ${stagingRoot}`));
        console.log(chalk.dim(`  Known tools: ${listKnownTools().join(', ')}\n`));
        return staged;
    }

    console.log(chalk.bold(`Tools staged in ${stagingRoot}:\n`));
    for (const name of staged) {
        const marker = name === config.staging.default_tool ? chalk.green(' (default)') : '';
        console.log(`  ${chalk.cyan(name)}${marker}`);
        const manifest = getToolManifest(name);
        if (manifest) {
            console.log(chalk.dim(`    ${manifest.description}`));
        }
    }
    console.log('');
    return staged;
}
