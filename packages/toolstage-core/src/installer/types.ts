/**
 * Installer types.
 *
 * A tool is staged as a directory of encoded asset names
 * (root_dot_gitignore, root_scripts, ...) that the installer copies
 * into the project root under their real names.
 */

export type AssetKind = 'directory' | 'file';

export interface StagedAsset {
    /** Path relative to the tool's staging directory */
    source: string;
    /** Path relative to the project root */
    destination: string;
    kind: AssetKind;
    /** Filename glob marked executable at the top level of a copied directory */
    executable?: string;
}

export interface ToolManifest {
    name: string;
    description: string;
    assets: StagedAsset[];
}

export interface PlannedStep {
    index: number;
    asset: StagedAsset;
    sourcePath: string;
    destinationPath: string;
}

export interface InstalledStep extends PlannedStep {
    /** Absolute paths given execute permission by this step */
    executables: string[];
}

export interface InstallResult {
    tool: string;
    stagingDir: string;
    dryRun: boolean;
    steps: InstalledStep[];
}

export interface InstallOptions {
    cwd: string;
    tool?: string;
    /** Staging root, relative to cwd or absolute */
    stagingRoot?: string;
    dryRun?: boolean;
    onStep?: (step: InstalledStep) => void;
}

export interface Requirement {
    command: string;
    /** Lowest accepted version, e.g. 18.0.0 */
    minVersion: string;
}

export interface RequirementCheck extends Requirement {
    /** Version found, when `--version` printed one */
    version?: string;
    met: boolean;
    message: string;
}

export interface ArchiveTool {
    name: string;
    description: string;
    url: string;
    /** File name of the release zip inside the staging root */
    archive: string;
    sha256: string;
    requirements: Requirement[];
    /** Commands run in the extracted directory, in order */
    setupCommands: string[][];
    /** File that must exist once setup has run */
    entryPoint: string;
}

export type CommandRunner = (
    file: string,
    args: string[],
    options?: { cwd?: string },
) => Promise<{ stdout: string }>;

export interface ArchiveSetupOptions {
    cwd: string;
    /** Built-in archive tool name, or a tool definition */
    tool?: string | ArchiveTool;
    stagingRoot?: string;
    skipRequirements?: boolean;
    run?: CommandRunner;
    fetchImpl?: typeof fetch;
    onRequirement?: (check: RequirementCheck) => void;
    onCommand?: (command: string[]) => void;
}

export interface ArchiveSetupResult {
    tool: string;
    archivePath: string;
    extractDir: string;
    requirements: RequirementCheck[];
    downloaded: boolean;
    extracted: boolean;
    setupRan: boolean;
}
