import { describe, it, expect } from 'vitest';
import { isGeneratedSource } from '../src/scan/generated-code.js';

describe('isGeneratedSource', () => {
    it('detects @generated in a line comment header', () => {
        expect(isGeneratedSource('// @generated by protoc\nexport const a = 1;\n')).toBe(true);
    });

    it('detects auto-generated markers in a block comment header', () => {
        expect(isGeneratedSource('/*\n * <auto-generated>\n */\nexport const a = 1;\n')).toBe(true);
    });

    it('looks past a shebang and empty lines', () => {
        expect(isGeneratedSource('#!/usr/bin/env node\n\n// @generated\nmain();\n')).toBe(true);
    });

    it('ignores markers after the first line of code', () => {
        expect(isGeneratedSource('export const a = 1;\n// @generated\n')).toBe(false);
    });

    it('ignores ordinary headers', () => {
        expect(isGeneratedSource('/* Licensed under MIT */\n// helpers\nexport const a = 1;\n')).toBe(false);
        expect(isGeneratedSource('')).toBe(false);
    });
});
