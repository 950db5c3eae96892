/**
 * Archive-based tool setup (web_search_mcp).
 *
 * Unlike the copy manifests, an archive tool ships as a pinned release
 * zip: requirements are checked first, the zip is fetched into the
 * staging directory unless a verified copy is already there, extracted
 * once, then its npm setup runs until the `.setup_complete` marker exists.
 */

import fs from 'fs-extra';
import path from 'path';
import { createHash } from 'crypto';
import AdmZip from 'adm-zip';
import semver from 'semver';
import { execa } from 'execa';
import { InstallError, errorMessage } from '../errors.js';
import { Logger } from '../utils/logger.js';
import { DEFAULT_STAGING_ROOT } from '../types/index.js';
import type {
    ArchiveSetupOptions,
    ArchiveSetupResult,
    ArchiveTool,
    CommandRunner,
    Requirement,
    RequirementCheck,
} from './types.js';

export const SETUP_MARKER = '.setup_complete';

const WEB_SEARCH_MCP: ArchiveTool = {
    name: 'web_search_mcp',
    description: 'Web search MCP server from a pinned release, with npm and Playwright setup',
    url: 'https://github.com/mrkrsl/web-search-mcp/releases/download/v0.3.2/web-search-mcp-v0.3.2.zip',
    archive: 'web-search-mcp-v0.3.2.zip',
    sha256: '1d8a2aeeda4c927fe513aea6e2f8e5775ac661ec0a15b1cab4d6d617e48dd27e',
    requirements: [
        { command: 'node', minVersion: '18.0.0' },
        { command: 'npm', minVersion: '8.0.0' },
    ],
    setupCommands: [
        ['npm', 'install'],
        ['npx', 'playwright', 'install'],
    ],
    entryPoint: 'dist/index.js',
};

export const ARCHIVE_TOOLS: Readonly<Record<string, ArchiveTool>> = {
    [WEB_SEARCH_MCP.name]: WEB_SEARCH_MCP,
};

export function getArchiveTool(name: string): ArchiveTool | undefined {
    return Object.prototype.hasOwnProperty.call(ARCHIVE_TOOLS, name) ? ARCHIVE_TOOLS[name] : undefined;
}

export const defaultRunner: CommandRunner = async (file, args, options) => {
    const { stdout } = await execa(file, args, { cwd: options?.cwd });
    return { stdout };
};

/**
 * Run `<command> --version` and compare the first version in its output
 * (`v20.5.0`, `10.2.4`) against the minimum.
 */
export async function checkRequirement(requirement: Requirement, run: CommandRunner = defaultRunner): Promise<RequirementCheck> {
    const { command, minVersion } = requirement;
    let stdout: string;
    try {
        ({ stdout } = await run(command, ['--version']));
    } catch (error) {
        Logger.debug(`${command} --version failed: ${errorMessage(error)}`);
        return { ...requirement, met: false, message: `${command} not found or failed to run` };
    }

    const found = semver.coerce(stdout);
    if (!found) {
        return { ...requirement, met: false, message: `Could not parse ${command} version from: ${stdout.trim()}` };
    }
    const met = semver.gte(found, minVersion);
    return {
        ...requirement,
        version: found.version,
        met,
        message: met ? `${command} ${found.version}` : `${command} ${found.version} (requires ${minVersion}+)`,
    };
}

export async function checkRequirements(requirements: Requirement[], run: CommandRunner = defaultRunner): Promise<RequirementCheck[]> {
    const checks: RequirementCheck[] = [];
    for (const requirement of requirements) {
        checks.push(await checkRequirement(requirement, run));
    }
    return checks;
}

export async function sha256File(file: string): Promise<string> {
    const hash = createHash('sha256');
    hash.update(await fs.readFile(file));
    return hash.digest('hex');
}

export async function verifyArchive(file: string, expectedSha256: string): Promise<boolean> {
    return (await sha256File(file)) === expectedSha256.toLowerCase();
}

/**
 * Make sure a verified copy of the archive sits at `archivePath`.
 * A staged copy that fails verification is deleted and fetched again.
 * Returns true when a download happened.
 */
export async function ensureArchive(
    tool: ArchiveTool,
    archivePath: string,
    fetchImpl: typeof fetch = fetch,
): Promise<boolean> {
    if (await fs.pathExists(archivePath)) {
        if (await verifyArchive(archivePath, tool.sha256)) {
            Logger.debug(`${tool.archive} already staged and verified`);
            return false;
        }
        Logger.warn(`${tool.archive} failed its checksum, downloading again`);
        await fs.remove(archivePath);
    }

    const response = await fetchImpl(tool.url);
    if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }
    const body = Buffer.from(await response.arrayBuffer());
    const actual = createHash('sha256').update(body).digest('hex');
    if (actual !== tool.sha256.toLowerCase()) {
        throw new Error(`Checksum mismatch for ${tool.archive}: expected ${tool.sha256}, got ${actual}`);
    }

    const tempPath = `${archivePath}.download`;
    await fs.ensureDir(path.dirname(archivePath));
    await fs.writeFile(tempPath, body);
    await fs.rename(tempPath, archivePath);
    return true;
}

/**
 * Extract the archive into `extractDir` unless that directory exists.
 * A failed extraction removes the partial directory. Returns true when
 * the archive was extracted.
 */
export async function extractArchive(archivePath: string, extractDir: string): Promise<boolean> {
    if (await fs.pathExists(extractDir)) {
        return false;
    }
    try {
        const zip = new AdmZip(archivePath);
        await fs.ensureDir(extractDir);
        zip.extractAllTo(extractDir, true);
    } catch (error) {
        await fs.remove(extractDir);
        throw error;
    }
    return true;
}

/**
 * Run the tool's setup commands in `extractDir` once; the marker file
 * records success. Returns true when the commands ran.
 */
export async function runArchiveSetup(
    tool: ArchiveTool,
    extractDir: string,
    run: CommandRunner = defaultRunner,
    onCommand?: (command: string[]) => void,
): Promise<boolean> {
    const marker = path.join(extractDir, SETUP_MARKER);
    if (await fs.pathExists(marker)) {
        return false;
    }
    for (const [file, ...args] of tool.setupCommands) {
        onCommand?.([file, ...args]);
        await run(file, args, { cwd: extractDir });
    }
    if (!(await fs.pathExists(path.join(extractDir, tool.entryPoint)))) {
        throw new Error(`${tool.entryPoint} is missing after setup`);
    }
    await fs.writeFile(marker, '');
    return true;
}

function stageFailure(tool: ArchiveTool, stage: string, error: unknown): InstallError {
    return new InstallError(`${tool.name} ${stage} failed: ${errorMessage(error)}`, { cause: error });
}

/**
 * Full setup of an archive tool into `<stagingRoot>/<archive stem>/`.
 *
 * @throws InstallError for an unknown tool, unmet requirements, or a
 *         failed download, extraction or setup command.
 */
export async function setupArchiveTool(options: ArchiveSetupOptions): Promise<ArchiveSetupResult> {
    const { cwd, tool: requested = WEB_SEARCH_MCP.name, run = defaultRunner, fetchImpl = fetch } = options;

    const tool = typeof requested === 'string' ? getArchiveTool(requested) : requested;
    if (!tool) {
        throw new InstallError(`Unknown archive tool '${String(requested)}'. Known: ${Object.keys(ARCHIVE_TOOLS).sort().join(', ')}`);
    }

    const stagingRoot = path.resolve(cwd, options.stagingRoot ?? DEFAULT_STAGING_ROOT);
    const archivePath = path.join(stagingRoot, tool.archive);
    const extractDir = path.join(stagingRoot, path.basename(tool.archive, path.extname(tool.archive)));

    const requirements = options.skipRequirements ? [] : await checkRequirements(tool.requirements, run);
    for (const check of requirements) {
        options.onRequirement?.(check);
    }
    const unmet = requirements.filter(check => !check.met);
    if (unmet.length > 0) {
        throw new InstallError(`Requirements not met: ${unmet.map(check => check.message).join('; ')}`);
    }

    let downloaded: boolean;
    try {
        downloaded = await ensureArchive(tool, archivePath, fetchImpl);
    } catch (error) {
        throw stageFailure(tool, 'download', error);
    }

    let extracted: boolean;
    try {
        extracted = await extractArchive(archivePath, extractDir);
    } catch (error) {
        throw stageFailure(tool, 'extraction', error);
    }

    let setupRan: boolean;
    try {
        setupRan = await runArchiveSetup(tool, extractDir, run, options.onCommand);
    } catch (error) {
        throw stageFailure(tool, 'setup', error);
    }

    return { tool: tool.name, archivePath, extractDir, requirements, downloaded, extracted, setupRan };
}
