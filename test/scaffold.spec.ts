// test/scaffold.spec.ts
import {execFileSync} from 'child_process';
import fs from 'fs';
import path from 'path';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {scaffold} from '../src/core/scaffold';
import {afterEach as afterEachHook, extendWith, type ScaffoldOptions} from '../src/schema';
import {
    captureScaffoldError,
    entryNames,
    makeDir,
    makeSymlink,
    makeTempDir,
    modeOf,
    quietLogger,
    readText,
    readTree,
    removeDir,
    writeFile,
} from './helpers';

describe('scaffold', () => {
    let tmp: string;
    let src: string;
    let dest: string;

    beforeEach(() => {
        tmp = makeTempDir();
        src = makeDir(tmp, 'template');
        dest = path.join(tmp, 'out');
    });

    afterEach(() => removeDir(tmp));

    function run(context: unknown, options: ScaffoldOptions = {}) {
        return scaffold(src, dest, context, {logger: quietLogger, ...options});
    }

    it('renders files and resolves symlink chains', () => {
        writeFile(src, 'regular-test', 'Hello, {{Name}}!\n', 0o600);
        makeSymlink(src, 'intermediate', 'regular-test');
        makeSymlink(src, 'symlink-test', 'intermediate');

        const result = run({Name: 'test'});

        expect(result.files).toEqual([path.join(dest, 'regular-test')]);
        expect([...result.symlinks].sort()).toEqual([path.join(dest, 'intermediate'), path.join(dest, 'symlink-test')]);

        const tree = readTree(dest);
        expect(tree.dirs).toEqual([]);
        expect(tree.entries).toEqual([
            {name: 'intermediate', kind: 'symlink', mode: 0o777, content: 'Hello, test!\n', link: 'regular-test'},
            {name: 'regular-test', kind: 'file', mode: 0o600, content: 'Hello, test!\n', link: undefined},
            {name: 'symlink-test', kind: 'symlink', mode: 0o777, content: 'Hello, test!\n', link: 'intermediate'},
        ]);
    });

    it('copies file modes verbatim and creates owner-only directories', () => {
        writeFile(src, 'bin/run.sh', '#!/bin/sh\n', 0o755);
        writeFile(src, 'bin/notes.txt', 'notes', 0o640);

        run({});

        expect(modeOf(dest, 'bin/run.sh')).toBe(0o755);
        expect(modeOf(dest, 'bin/notes.txt')).toBe(0o640);
        expect(modeOf(dest, 'bin')).toBe(0o700);
    });

    it('renders templated directory and file names', () => {
        writeFile(src, '{{project}}/{{kind}}.txt', 'kind={{kind}}');

        const result = run({project: 'demo', kind: 'service'});

        expect(result.directories).toEqual([path.join(dest, 'demo')]);
        expect(readText(dest, 'demo/service.txt')).toBe('kind=service');
    });

    it('omits entries whose name renders empty, with their subtree', () => {
        writeFile(src, '{{docsDir}}/guide.md', 'guide');
        writeFile(src, '{{optional}}', 'optional');
        writeFile(src, 'kept.txt', 'kept');

        run({docsDir: '', optional: ''});

        expect(readTree(dest)).toEqual({
            dirs: [],
            entries: [{name: 'kept.txt', kind: 'file', mode: 0o600, content: 'kept', link: undefined}],
        });
    });

    it('skips excluded entries and their subtree before rendering', () => {
        writeFile(src, 'docs/{{broken/readme.md', 'unused');
        writeFile(src, 'secret.txt', '{{broken');
        writeFile(src, 'app.txt', 'app');

        run({}, {exclude: ['^docs', 'secret']});

        expect(readTree(dest).dirs).toEqual([]);
        expect(entryNames(readTree(dest))).toEqual(['app.txt']);
    });

    it('removes the template suffix from destination names', () => {
        writeFile(src, 'README.md.tmpl', '# {{title}}\n');
        writeFile(src, 'plain.tmpl.txt', 'plain');

        run({title: 'Demo'});

        expect(entryNames(readTree(dest))).toEqual(['README.md', 'plain.tmpl.txt']);
        expect(readText(dest, 'README.md')).toBe('# Demo\n');
    });

    it('honors a custom template suffix', () => {
        writeFile(src, 'index.ts.hbs', 'export const name = "{{name}}";\n');

        run({name: 'x'}, {templateSuffix: '.hbs'});

        expect(readText(dest, 'index.ts')).toBe('export const name = "x";\n');
    });

    it('fans a directory out with dir(), one context per copy', () => {
        writeFile(src, '{{dir "first" first}}{{dir "second" second}}/name.txt', '{{name}}');

        const result = run({name: 'parent', first: {name: 'one'}, second: {name: 'two'}});

        expect(result.directories).toEqual([path.join(dest, 'first'), path.join(dest, 'second')]);
        expect(readTree(dest).dirs).toEqual(['first', 'second']);
        expect(readText(dest, 'first/name.txt')).toBe('one');
        expect(readText(dest, 'second/name.txt')).toBe('two');
    });

    it('fans out over a list with dirEach()', () => {
        writeFile(src, '{{dirEach modules "name"}}/{{name}}.ts.tmpl', 'port={{port}}');

        run({
            modules: [
                {name: 'auth', port: 1},
                {name: 'billing', port: 2},
            ],
        });

        const tree = readTree(dest);
        expect(tree.dirs).toEqual(['auth', 'billing']);
        expect(entryNames(tree)).toEqual(['auth/auth.ts', 'billing/billing.ts']);
        expect(readText(dest, 'billing/billing.ts')).toBe('port=2');
    });

    it('fans out a file with dir()', () => {
        writeFile(src, '{{dir "a.txt" a}}{{dir "b.txt" b}}', 'v={{v}}');

        run({a: {v: 1}, b: {v: 2}});

        expect(readText(dest, 'a.txt')).toBe('v=1');
        expect(readText(dest, 'b.txt')).toBe('v=2');
    });

    it('rejects dir() in file contents', () => {
        writeFile(src, 'bad.txt', '{{dir "x" this}}');

        const err = captureScaffoldError(() => run({}));

        expect(err.kind).toBe('template');
        expect(err.path).toBe('bad.txt');
        expect(err.message).toBe('failed to evaluate template bad.txt: dir() can only be used in file and directory names');
    });

    it('renders symlink targets and relativizes absolute ones', () => {
        writeFile(src, '{{Name}}.txt', 'data');
        makeSymlink(src, 'named', '{{Name}}.txt');
        makeSymlink(src, 'absolute', '{{root}}/{{Name}}.txt');

        run({Name: 'data', root: dest});

        expect(fs.readlinkSync(path.join(dest, 'named'))).toBe('data.txt');
        expect(fs.readlinkSync(path.join(dest, 'absolute'))).toBe('data.txt');
        expect(readText(dest, 'absolute')).toBe('data');
    });

    it('fails when a symlink targets an excluded entry', () => {
        writeFile(src, 'skipped.txt', 'x');
        makeSymlink(src, 'link', 'skipped.txt');

        const err = captureScaffoldError(() => run({}, {exclude: ['^skipped']}));

        expect(err.kind).toBe('symlink');
        expect(err.message).toBe('symlink link points at skipped.txt, which was not generated');
    });

    it('fails on symlink cycles', () => {
        makeSymlink(src, 'a', 'b');
        makeSymlink(src, 'b', 'a');

        expect(captureScaffoldError(() => run({})).kind).toBe('symlink');
    });

    it('replaces a symlink left at a file destination', () => {
        writeFile(tmp, 'elsewhere.txt', 'untouched');
        makeSymlink(dest, 'file.txt', path.join(tmp, 'elsewhere.txt'));
        writeFile(src, 'file.txt', 'fresh');

        run({});

        expect(fs.lstatSync(path.join(dest, 'file.txt')).isSymbolicLink()).toBe(false);
        expect(readText(dest, 'file.txt')).toBe('fresh');
        expect(readText(tmp, 'elsewhere.txt')).toBe('untouched');
    });

    it('produces identical trees for identical inputs', () => {
        writeFile(src, '{{dirEach items "id"}}/item.txt', '{{id}}:{{label}}');
        writeFile(src, 'top.txt.tmpl', '{{title}}');
        makeSymlink(src, 'top-link', 'top.txt');
        const context = {title: 'T', items: [{id: 'x', label: 'ex'}, {id: 'y', label: 'why'}]};

        run(context);
        const first = readTree(dest);
        removeDir(dest);
        run(context);

        expect(readTree(dest)).toEqual(first);
        expect(first.dirs).toEqual(['x', 'y']);
    });

    it('reports template errors with the template-relative path', () => {
        writeFile(src, 'nested/bad.txt', 'Hi {{oops');

        const err = captureScaffoldError(() => run({}));

        expect(err.kind).toBe('template');
        expect(err.path).toBe('nested/bad.txt');
    });

    it('rejects an invalid exclusion before writing anything', () => {
        writeFile(src, 'a.txt', 'a');

        const err = captureScaffoldError(() => run({}, {exclude: ['[']}));

        expect(err.kind).toBe('config');
        expect(fs.existsSync(dest)).toBe(false);
    });

    it('uses functions passed in options', () => {
        writeFile(src, 'out.txt', '{{shout word}}');

        run({word: 'hi'}, {functions: {shout: (value: string) => `${value.toUpperCase()}!`}});

        expect(readText(dest, 'out.txt')).toBe('HI!');
    });

    it('copies binary files byte-for-byte without rendering', () => {
        const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0xff, 0xfe, 0x00, 0x80]);
        writeFile(src, 'logo.png', bytes, 0o644);
        const seen: string[] = [];

        const result = run({}, {extensions: [afterEachHook((p) => seen.push(path.relative(dest, p)))]});

        expect(fs.readFileSync(path.join(dest, 'logo.png')).equals(bytes)).toBe(true);
        expect(modeOf(dest, 'logo.png')).toBe(0o644);
        expect(result.files).toEqual([path.join(dest, 'logo.png')]);
        expect(seen).toEqual(['logo.png']);
    });

    it('copies valid UTF-8 containing NUL bytes verbatim', () => {
        writeFile(src, 'data.bin', 'a\u0000{{b}}');

        run({b: 'x'});

        expect(readText(dest, 'data.bin')).toBe('a\u0000{{b}}');
    });

    it('keeps a byte order mark on rendered text', () => {
        writeFile(src, 'bom.txt', '\ufeff{{v}}');

        run({v: 'ok'});

        expect(readText(dest, 'bom.txt')).toBe('\ufeffok');
    });

    it('refuses to replace a non-empty directory with a symlink', () => {
        writeFile(src, 'real/keep.txt', 'keep');
        makeSymlink(src, 'data', 'real');
        writeFile(dest, 'data/user-file.txt', 'mine');

        const err = captureScaffoldError(() => run({}));

        expect(err.kind).toBe('filesystem');
        expect(err.path).toBe(path.join(dest, 'data'));
        expect(err.message).toMatch(/^failed to remove .*ENOTEMPTY/);
        expect(readText(dest, 'data/user-file.txt')).toBe('mine');
    });

    it('rejects entries that are not files, directories or symlinks', () => {
        const pipe = path.join(src, 'pipe');
        execFileSync('mkfifo', [pipe]);

        const err = captureScaffoldError(() => run({}));

        expect(err.kind).toBe('unsupported');
        expect(err.path).toBe(pipe);
        expect(err.message).toBe(`${pipe}: unsupported file type fifo`);
    });

    describe('extensions', () => {
        it('lets extend add functions, exclusions and a new context', () => {
            writeFile(src, 'greeting.txt', '{{shout Name}}');
            writeFile(src, 'secret.txt', 'hidden');

            run(
                {Name: 'initial'},
                {
                    extensions: [
                        extendWith((config) => {
                            config.functions.shout = (value: string) => value.toUpperCase();
                            config.exclude.push('^secret');
                            config.context = {Name: 'replaced'};
                        }),
                    ],
                },
            );

            expect(entryNames(readTree(dest))).toEqual(['greeting.txt']);
            expect(readText(dest, 'greeting.txt')).toBe('REPLACED');
        });

        it('sees the functions of earlier extensions', () => {
            writeFile(src, 'x.txt', '{{second}}');

            run({}, {
                extensions: [
                    extendWith((config) => {
                        config.functions.first = () => 'one';
                    }),
                    extendWith((config) => {
                        const first = config.functions.first;
                        config.functions.second = () => `${String(first())}+two`;
                    }),
                ],
            });

            expect(readText(dest, 'x.txt')).toBe('one+two');
        });

        it('calls afterEach for directories and files but not symlinks', () => {
            writeFile(src, 'sub/file.txt', 'f');
            writeFile(src, 'top.txt', 't');
            makeSymlink(src, 'link', 'top.txt');
            const seen: string[] = [];

            run({}, {extensions: [afterEachHook((p) => seen.push(path.relative(dest, p)))]});

            expect([...seen].sort()).toEqual(['sub', path.join('sub', 'file.txt'), 'top.txt']);
            expect(seen.indexOf('sub')).toBeLessThan(seen.indexOf(path.join('sub', 'file.txt')));
        });

        it('sees the file already written in afterEach', () => {
            writeFile(src, 'a.txt', 'content {{n}}');
            const contents: string[] = [];

            run({n: 1}, {extensions: [afterEachHook((p) => contents.push(fs.readFileSync(p, 'utf8')))]});

            expect(contents).toEqual(['content 1']);
        });

        it('aborts before any write when extend fails', () => {
            writeFile(src, 'a.txt', 'a');

            const err = captureScaffoldError(() =>
                run({}, {
                    extensions: [
                        extendWith(() => {
                            throw new Error('bad setup');
                        }, 'setup'),
                    ],
                }),
            );

            expect(err.kind).toBe('extension');
            expect(err.phase).toBe('extend');
            expect(err.message).toBe('setup failed to extend scaffolder: bad setup');
            expect(fs.existsSync(dest)).toBe(false);
        });

        it('aborts the walk when afterEach fails, keeping what was written', () => {
            writeFile(src, 'a.txt', 'a');

            const err = captureScaffoldError(() =>
                run({}, {
                    extensions: [
                        afterEachHook(() => {
                            throw new Error('hook failed');
                        }),
                    ],
                }),
            );

            expect(err.kind).toBe('extension');
            expect(err.phase).toBe('afterEach');
            expect(err.path).toBe(path.join(dest, 'a.txt'));
            expect(readText(dest, 'a.txt')).toBe('a');
        });
    });
});
