import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';

export const CLI_PACKAGE = '@toolstage/cli';

function versionOf(pkgPath: string, name: string): string | undefined {
    const pkg: unknown = fs.readJsonSync(pkgPath, { throws: false });
    if (typeof pkg !== 'object' || pkg === null || !('name' in pkg) || pkg.name !== name) {
        return undefined;
    }
    return 'version' in pkg && typeof pkg.version === 'string' && pkg.version.trim() ? pkg.version : undefined;
}

/**
 * Version of the nearest package.json named `name`, searching from
 * `startDir` upwards (src/utils or dist/utils both reach the package root).
 */
export function findPackageVersion(startDir: string, name = CLI_PACKAGE): string | undefined {
    let dir = path.resolve(startDir);
    for (;;) {
        const pkgPath = path.join(dir, 'package.json');
        if (fs.existsSync(pkgPath)) {
            const version = versionOf(pkgPath, name);
            if (version) {
                return version;
            }
        }
        const parent = path.dirname(dir);
        if (parent === dir) {
            return undefined;
        }
        dir = parent;
    }
}

export function getCliVersion(fallback = '0.0.0'): string {
    return findPackageVersion(path.dirname(fileURLToPath(import.meta.url))) ?? fallback;
}
