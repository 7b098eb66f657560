import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { resolveTargets } from '../src/scan/file-resolver.js';
import type { FilePatternConfig } from '../src/schemas/config-schemas.js';

describe('resolveTargets', () => {
    let root: string;

    const touch = (rel: string) => {
        const full = path.join(root, rel);
        mkdirSync(path.dirname(full), { recursive: true });
        writeFileSync(full, 'export {};\n');
    };
    const abs = (rel: string) => path.join(root, rel);

    beforeEach(() => {
        root = mkdtempSync(path.join(tmpdir(), 'commentlint-scan-'));
        touch('src/a.ts');
        touch('src/b.tsx');
        touch('src/types.d.ts');
        touch('src/readme.md');
        touch('src/nested/c.js');
        touch('node_modules/pkg/index.ts');
    });

    afterEach(() => {
        rmSync(root, { recursive: true, force: true });
    });

    const lintable = () => [abs('src/a.ts'), abs('src/b.tsx'), abs('src/nested/c.js')];

    it('globs config sections relative to the config directory', () => {
        const scanPaths: FilePatternConfig[] = [{ pattern: 'src/**/*', severities: {} }];

        const targets = resolveTargets({ cliArgs: [], cwd: tmpdir(), scanPaths, configDir: root });

        expect(targets).toEqual(lintable());
    });

    it('walks directories given on the command line', () => {
        const targets = resolveTargets({ cliArgs: ['src'], cwd: root, scanPaths: [], configDir: root });

        expect(targets).toEqual(lintable());
    });

    it('skips node_modules', () => {
        const targets = resolveTargets({ cliArgs: ['.'], cwd: root, scanPaths: [], configDir: root });

        expect(targets).toEqual(lintable());
    });

    it('accepts single files and globs', () => {
        const targets = resolveTargets({
            cliArgs: ['src/b.tsx', 'src/**/*.ts', 'src/a.ts'],
            cwd: root,
            scanPaths: [],
            configDir: root,
        });

        expect(targets).toEqual([abs('src/a.ts'), abs('src/b.tsx')]);
    });

    it('drops declaration files given explicitly', () => {
        const targets = resolveTargets({ cliArgs: ['src/types.d.ts'], cwd: root, scanPaths: [], configDir: root });

        expect(targets).toEqual([]);
    });
});
