import * as path from 'path';
import * as fs from 'fs';

/**
 * Validates if a path resolves to a location within the allowed root directory.
 * It checks against path traversal (..) and against symlinks (of the path or of
 * any existing ancestor) pointing outside the root.
 *
 * @param inputPath The path to validate (relative or absolute).
 * @param root The allowed root directory (default: process.cwd()).
 * @returns true if the path is safe, false otherwise.
 */
export function isSafePath(inputPath: string, root: string = process.cwd()): boolean {
    const resolvedPath = path.resolve(inputPath);
    const allowedRoot = path.resolve(root);

    if (!isWithin(resolvedPath, allowedRoot)) {
        return false;
    }

    if (!fs.existsSync(allowedRoot)) {
        return true;
    }

    try {
        const realRoot = fs.realpathSync(allowedRoot);
        const existing = nearestExistingAncestor(resolvedPath);
        return isWithin(fs.realpathSync(existing), realRoot);
    } catch {
        // realpath failures (permissions, dangling links) deny access
        return false;
    }
}

/** Forward-slash form of a path relative to root, stable across platforms. */
export function toPosixRelative(root: string, filePath: string): string {
    return path.relative(root, filePath).split(path.sep).join('/');
}

function isWithin(candidate: string, root: string): boolean {
    // a filesystem root such as "/" already ends in the separator
    const prefix = root.endsWith(path.sep) ? root : root + path.sep;
    return candidate === root || candidate.startsWith(prefix);
}

function nearestExistingAncestor(target: string): string {
    let current = target;
    while (!fs.existsSync(current)) {
        const parent = path.dirname(current);
        if (parent === current) break;
        current = parent;
    }
    return current;
}
