import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import { NodeFileStore } from '../../src/filesystem/FileStore.js';
import { IconReadError } from '../../src/errors.js';

const FIXTURES = fileURLToPath(new URL('../fixtures', import.meta.url));

describe('NodeFileStore', () => {
    const store = new NodeFileStore();

    it('should report existing files', () => {
        expect(store.exists(join(FIXTURES, 'svg', 'camera.svg'))).toBe(true);
        expect(store.exists(join(FIXTURES, 'svg', 'money.svg'))).toBe(false);
    });

    it('should not treat directories as files', () => {
        expect(store.exists(join(FIXTURES, 'svg', 'solid'))).toBe(false);
    });

    it('should read file contents verbatim', () => {
        expect(store.read(join(FIXTURES, 'zondicons', 'flag.svg'))).toBe(
            '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 20 20"><path d="M7.5 12H2v8H0V0h12l.5 2H20l-3 6 3 6H8l-.5-2z"/></svg>',
        );
    });

    it('should wrap read failures in IconReadError', () => {
        const path = join(FIXTURES, 'svg', 'solid');
        let caught: unknown;
        try {
            store.read(path);
        } catch (e) {
            caught = e;
        }

        expect(caught).toBeInstanceOf(IconReadError);
        expect(caught).toMatchObject({ code: 'ICON_READ_FAILED', path });
        expect((caught as IconReadError).cause).toBeInstanceOf(Error);
    });

    it('should list files recursively with forward slashes, sorted', () => {
        expect(store.list(join(FIXTURES, 'svg'))).toEqual([
            'README.txt',
            'camera.svg',
            'flag.svg',
            'foo-camera.svg',
            'solid/camera.svg',
        ]);
    });

    it('should list nothing for a missing directory', () => {
        expect(store.list(join(FIXTURES, 'missing'))).toEqual([]);
    });
});

describe('NodeFileStore — symlinks', () => {
    const store = new NodeFileStore();
    let root: string;
    let elsewhere: string;

    beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), 'svg-icons-root-'));
        elsewhere = mkdtempSync(join(tmpdir(), 'svg-icons-target-'));

        writeFileSync(join(root, 'camera.svg'), '<svg/>');
        writeFileSync(join(elsewhere, 'bolt.svg'), '<svg id="bolt"/>');
        mkdirSync(join(elsewhere, 'brands'));
        writeFileSync(join(elsewhere, 'brands', 'github.svg'), '<svg/>');

        symlinkSync(join(elsewhere, 'bolt.svg'), join(root, 'bolt.svg'));
        symlinkSync(join(elsewhere, 'brands'), join(root, 'brands'));
        symlinkSync(join(elsewhere, 'gone.svg'), join(root, 'gone.svg'));
    });

    afterEach(() => {
        rmSync(root, { recursive: true, force: true });
        rmSync(elsewhere, { recursive: true, force: true });
    });

    it('should list linked files and descend into linked directories', () => {
        expect(store.list(root)).toEqual(['bolt.svg', 'brands/github.svg', 'camera.svg']);
    });

    it('should skip dangling links', () => {
        expect(store.list(root)).not.toContain('gone.svg');
        expect(store.exists(join(root, 'gone.svg'))).toBe(false);
    });

    it('should read through a linked file', () => {
        expect(store.exists(join(root, 'bolt.svg'))).toBe(true);
        expect(store.read(join(root, 'bolt.svg'))).toBe('<svg id="bolt"/>');
    });
});
