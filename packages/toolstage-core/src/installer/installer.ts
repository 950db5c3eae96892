/**
 * Staged tool installer.
 *
 * Copies a tool's assets from the staging directory into the project
 * root, one step at a time and in manifest order. The first failing
 * step aborts the install; earlier steps are left in place.
 */

import fs from 'fs-extra';
import path from 'path';
import { globby } from 'globby';
import { DEFAULT_STAGING_ROOT, DEFAULT_TOOL } from '../types/index.js';
import { InstallError, errorMessage } from '../errors.js';
import { Logger } from '../utils/logger.js';
import { getToolManifest, TOOL_MANIFESTS } from './manifests.js';
import type {
    InstallOptions,
    InstallResult,
    InstalledStep,
    PlannedStep,
    StagedAsset,
    ToolManifest,
} from './types.js';

// u+x, g+x, o+x
const EXECUTE_BITS = 0o111;

export function resolveStagingRoot(cwd: string, stagingRoot = DEFAULT_STAGING_ROOT): string {
    return path.resolve(cwd, stagingRoot);
}

/**
 * Resolve absolute source and destination paths for every asset, in order.
 */
export function planInstall(manifest: ToolManifest, stagingDir: string, cwd: string): PlannedStep[] {
    return manifest.assets.map((asset, index) => ({
        index,
        asset,
        sourcePath: path.join(stagingDir, asset.source),
        destinationPath: path.join(cwd, asset.destination),
    }));
}

/**
 * Names of staged tool directories that have a built-in manifest.
 */
export async function listStagedTools(stagingRoot: string): Promise<string[]> {
    if (!(await fs.pathExists(stagingRoot))) {
        return [];
    }
    const entries = await fs.readdir(stagingRoot, { withFileTypes: true });
    return entries
        .filter(entry => entry.isDirectory() && getToolManifest(entry.name) !== undefined)
        .map(entry => entry.name)
        .sort();
}

export function listKnownTools(): string[] {
    return Object.keys(TOOL_MANIFESTS).sort();
}

async function markExecutables(dir: string, pattern: string): Promise<string[]> {
    const matches = await globby(pattern, { cwd: dir, onlyFiles: true, deep: 1, absolute: true });
    for (const file of matches) {
        const { mode } = await fs.stat(file);
        await fs.chmod(file, (mode & 0o7777) | EXECUTE_BITS);
    }
    return matches.sort();
}

async function assertSourceKind(step: PlannedStep): Promise<void> {
    // stat throws ENOENT for a missing source, which is the failure we surface
    const stat = await fs.stat(step.sourcePath);
    const isDir = stat.isDirectory();
    if (step.asset.kind === 'directory' && !isDir) {
        throw Object.assign(new Error(`Not a directory: ${step.sourcePath}`), { code: 'ENOTDIR' });
    }
    if (step.asset.kind === 'file' && isDir) {
        throw Object.assign(new Error(`Is a directory: ${step.sourcePath}`), { code: 'EISDIR' });
    }
}

async function runStep(step: PlannedStep): Promise<InstalledStep> {
    await assertSourceKind(step);
    await fs.copy(step.sourcePath, step.destinationPath, { overwrite: true, errorOnExist: false });

    const executables = step.asset.kind === 'directory' && step.asset.executable
        ? await markExecutables(step.destinationPath, step.asset.executable)
        : [];

    return { ...step, executables };
}

export function describeAsset(asset: StagedAsset): string {
    return asset.kind === 'directory' ? `${asset.destination}/` : asset.destination;
}

/**
 * Install a staged tool into `cwd`.
 *
 * @throws InstallError for an unknown tool, or wrapping the file-system
 *         error of the first step that fails.
 */
export async function installTool(options: InstallOptions): Promise<InstallResult> {
    const { cwd, tool = DEFAULT_TOOL, dryRun = false, onStep } = options;

    const manifest = getToolManifest(tool);
    if (!manifest) {
        throw new InstallError(`Unknown tool '${tool}'. Known tools: ${listKnownTools().join(', ')}`);
    }

    const stagingDir = path.join(resolveStagingRoot(cwd, options.stagingRoot), manifest.name);
    const steps: InstalledStep[] = [];

    Logger.debug(`Installing ${manifest.name} from ${stagingDir}${dryRun ? ' (dry run)' : ''}`);

    for (const planned of planInstall(manifest, stagingDir, cwd)) {
        let completed: InstalledStep;
        try {
            if (dryRun) {
                await assertSourceKind(planned);
                completed = { ...planned, executables: [] };
            } else {
                completed = await runStep(planned);
            }
        } catch (error) {
            throw new InstallError(
                `Failed to copy ${planned.asset.source} to ${describeAsset(planned.asset)}: ${errorMessage(error)}`,
                { step: planned.index, destination: planned.asset.destination, cause: error },
            );
        }

        steps.push(completed);
        onStep?.(completed);
    }

    return { tool: manifest.name, stagingDir, dryRun, steps };
}
