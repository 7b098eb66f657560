import { describe, it, expect } from 'vitest';
import { analyzeComments, checkCommentPrefix, hasSpaceAfterMarker } from '../src/analyzer/comment-prefix.js';
import { RuleId } from '../src/rules/types.js';
import { TriviaKind } from '../src/syntax/types.js';
import { createTypeScriptTree } from '../src/syntax/typescript-tree.js';
import { createSink, source, trivia } from './utils.js';

describe('comment prefix', () => {
    it.each(['// text', '//', '/// summary', '///'])('accepts %j', (text) => {
        expect(hasSpaceAfterMarker(text)).toBe(true);
    });

    it.each(['//text', '///summary', '////'])('rejects %j', (text) => {
        expect(hasSpaceAfterMarker(text)).toBe(false);
    });

    it('ignores text that is not a line comment', () => {
        expect(hasSpaceAfterMarker('/* block */')).toBeUndefined();
        expect(hasSpaceAfterMarker('# hash')).toBeUndefined();
    });

    it('reports the comment span', () => {
        const { findings, report } = createSink();
        checkCommentPrefix(trivia(TriviaKind.LineComment, '//x', 3, 4), report);
        checkCommentPrefix(trivia(TriviaKind.LineComment, '// y', 4, 4), report);

        expect(findings).toEqual([
            { rule: RuleId.CommentStartsWithSpace, line: 3, column: 4, endLine: 3, endColumn: 7 },
        ]);
    });

    it('checks comments outside of blocks', () => {
        const tree = createTypeScriptTree('sample.ts', source(
            'const handler = {',
            '  //missing',
            '  run: () => 1,',
            '};',
            '///summary',
        ));
        const { findings, report } = createSink();
        analyzeComments(tree, report);

        expect(findings).toEqual([
            { rule: RuleId.CommentStartsWithSpace, line: 1, column: 2, endLine: 1, endColumn: 11 },
            { rule: RuleId.CommentStartsWithSpace, line: 4, column: 0, endLine: 4, endColumn: 10 },
        ]);
    });

    it('skips block comments', () => {
        const tree = createTypeScriptTree('sample.ts', '/*no space*/\nconst a = 1;\n');
        const { findings, report } = createSink();
        analyzeComments(tree, report);

        expect(findings).toEqual([]);
    });
});
