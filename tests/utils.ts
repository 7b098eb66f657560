import { analyzeTree } from '../src/analyzer/comment-analyzer.js';
import type { Diagnostic } from '../src/analyzer/types.js';
import type { RuleId } from '../src/rules/types.js';
import { NodeKind, type SyntaxNode, type SyntaxTree, type Trivia, type TriviaKind } from '../src/syntax/types.js';
import { createTypeScriptTree } from '../src/syntax/typescript-tree.js';

export interface Finding {
    rule: RuleId;
    line: number;
    column: number;
    endLine: number;
    endColumn: number;
}

export function source(...lines: string[]): string {
    return lines.join('\n');
}

export function toFinding(diagnostic: { ruleId: RuleId; location: Diagnostic['location'] }): Finding {
    const { start, end } = diagnostic.location;
    return {
        rule: diagnostic.ruleId,
        line: start.line,
        column: start.column,
        endLine: end.line,
        endColumn: end.column,
    };
}

/**
 * Parses a snippet and returns every diagnostic with zero-based positions.
 */
export function lintSource(text: string, tabWidth = 4, filePath = 'sample.ts'): Finding[] {
    return analyzeTree(createTypeScriptTree(filePath, text), { tabWidth }).map(toFinding);
}

/**
 * Collects reported diagnostics for checkers that take a sink.
 */
export function createSink(): { findings: Finding[]; report: (ruleId: RuleId, location: Diagnostic['location']) => void } {
    const findings: Finding[] = [];
    return {
        findings,
        report: (ruleId, location) => {
            findings.push(toFinding({ ruleId, location }));
        },
    };
}

export function findBlocks(tree: SyntaxTree): SyntaxNode[] {
    const blocks: SyntaxNode[] = [];
    const visit = (node: SyntaxNode): void => {
        if (node.kind === NodeKind.Block) blocks.push(node);
        node.children.forEach(visit);
    };
    visit(tree.root);
    return blocks;
}

export function firstBlock(tree: SyntaxTree): SyntaxNode {
    const [block] = findBlocks(tree);
    if (!block) throw new Error('snippet has no block');
    return block;
}

export function trivia(kind: TriviaKind, text: string, line = 0, column = 0): Trivia {
    return {
        kind,
        text,
        span: { start: { line, column }, end: { line, column: column + text.length } },
    };
}

/**
 * Statement stand-in spanning columns 2 to 10 of the given lines.
 */
export function statement(
    kind: NodeKind,
    startLine: number,
    endLine: number = startLine,
    leadingTrivia: Trivia[] = []
): SyntaxNode {
    return {
        kind,
        span: { start: { line: startLine, column: 2 }, end: { line: endLine, column: 10 } },
        leadingTrivia,
        trailingTrivia: [],
        children: [],
    };
}
