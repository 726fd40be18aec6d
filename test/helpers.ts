// test/helpers.ts
import fs from 'fs';
import os from 'os';
import path from 'path';
import {walkDir} from '../src/core/walk-dir';
import {ScaffoldError} from '../src/core/errors';
import {Logger} from '../src/util/logger';
import {toPosixPath} from '../src/util/fs-utils';

export const quietLogger = new Logger({level: 'silent'});

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'tree-scaffolder-test-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, {recursive: true, force: true});
}

export function writeFile(root: string, rel: string, content: string | Uint8Array, mode = 0o600): string {
    const abs = path.join(root, rel);
    fs.mkdirSync(path.dirname(abs), {recursive: true});
    fs.writeFileSync(abs, content);
    fs.chmodSync(abs, mode);
    return abs;
}

export function makeDir(root: string, rel: string): string {
    const abs = path.join(root, rel);
    fs.mkdirSync(abs, {recursive: true});
    return abs;
}

export function makeSymlink(root: string, rel: string, target: string): string {
    const abs = path.join(root, rel);
    fs.mkdirSync(path.dirname(abs), {recursive: true});
    fs.symlinkSync(target, abs);
    return abs;
}

export function readText(root: string, rel: string): string {
    return fs.readFileSync(path.join(root, rel), 'utf8');
}

export function modeOf(root: string, rel: string): number {
    return fs.statSync(path.join(root, rel)).mode & 0o777;
}

export interface TreeEntry {
    name: string;
    kind: 'file' | 'symlink';
    mode: number;
    content: string;
    link?: string;
}

export interface Tree {
    dirs: string[];
    entries: TreeEntry[];
}

function byCodePoint(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

/**
 * Snapshot of a generated tree, sorted so assertions do not depend on
 * directory listing order. Symlink contents are read through the link.
 */
export function readTree(dir: string): Tree {
    const dirs: string[] = [];
    const entries: TreeEntry[] = [];

    walkDir(dir, (entryPath, entry) => {
        if (entryPath === dir) return;
        const name = toPosixPath(path.relative(dir, entryPath));
        if (entry.kind === 'directory') {
            dirs.push(name);
            return;
        }
        const isSymlink = entry.kind === 'symlink';
        const pointsAtDir = isSymlink && fs.statSync(entryPath).isDirectory();
        entries.push({
            name,
            kind: isSymlink ? 'symlink' : 'file',
            mode: entry.stats.mode & 0o777,
            content: pointsAtDir ? '' : fs.readFileSync(entryPath, 'utf8'),
            link: isSymlink ? fs.readlinkSync(entryPath) : undefined,
        });
    });

    dirs.sort(byCodePoint);
    entries.sort((a, b) => byCodePoint(a.name, b.name));
    return {dirs, entries};
}

export function entryNames(tree: Tree): string[] {
    return tree.entries.map((e) => e.name);
}

/**
 * Run `fn` and return the ScaffoldError it throws.
 */
export function captureScaffoldError(fn: () => unknown): ScaffoldError {
    try {
        fn();
    } catch (err) {
        if (err instanceof ScaffoldError) return err;
        throw err;
    }
    throw new Error('expected a ScaffoldError to be thrown');
}
