import { describe, it, expect } from 'vitest';
import { emptyPatterns, emptyStructure, resolvePipelineConfig } from '@critique/core';
import { ContextBuilder } from '../src/context-builder.js';
import { createTestIssue, createTestPreAnalysis } from '../src/test-helpers.js';

describe('ContextBuilder', () => {
  it('should render every section for an empty analysis', () => {
    const context = new ContextBuilder().build(createTestPreAnalysis(), {
      filename: 'app.py',
      language: 'python',
      size: 120,
    });

    expect(context).toBe(
      [
        '# Pre-analysis context',
        '',
        '## File',
        '- Filename: app.py',
        '- Language: python',
        '- Size: 120 bytes',
        '- Lines: 0 total, 0 code, 0 comment, 0 blank',
        '',
        '## Structure',
        '- Functions: 0',
        '- Classes: 0',
        '- Imports: 0',
        '- Uses async: No',
        '- Uses decorators: No',
        '',
        '## Complexity',
        '- Average: 0',
        '- Maximum: 0',
        'No functions at or above threshold 10.',
        '',
        '## Patterns',
        'No notable patterns detected.',
        '',
        '## Pre-identified issues (0)',
        'No issues identified in pre-analysis.',
        '',
      ].join('\n'),
    );
  });

  it('should list names, high-complexity functions and active patterns', () => {
    const analysis = createTestPreAnalysis({
      structure: {
        ...emptyStructure(),
        totalLines: 40,
        codeLines: 30,
        commentLines: 4,
        blankLines: 6,
        functionCount: 2,
        classCount: 1,
        importCount: 3,
        functions: [
          { name: 'load', startLine: 3, endLine: 20 },
          { name: 'save', startLine: 22, endLine: 30 },
        ],
        classes: [{ name: 'Store', line: 1 }],
        usesAsync: true,
        confidence: 'low',
      },
      complexity: {
        functions: [
          { name: 'load', line: 3, score: 12 },
          { name: 'save', line: 22, score: 2 },
        ],
        average: 7,
        max: 12,
        high: [{ name: 'load', line: 3, score: 12 }],
        threshold: 10,
      },
      patterns: { ...emptyPatterns(), DB_QUERY: { count: 2, lines: [5, 9] } },
    });

    const context = new ContextBuilder().build(analysis);

    expect(context).toContain('- Filename: unknown\n- Language: unknown\n- Lines: 40 total');
    expect(context).toContain('- Function names: `load`, `save`');
    expect(context).toContain('- Class names: `Store`');
    expect(context).toContain('- Uses async: Yes');
    expect(context).toContain('- Note: blocks could not be matched cleanly; function spans are approximate');
    expect(context).toContain(
      'Functions at or above threshold 10:\n- `load` (line 3): complexity 12',
    );
    expect(context).toContain('## Patterns\n- DB_QUERY: 2 occurrence(s) (lines 5, 9)\n\n');
  });

  it('should summarize function names past ten', () => {
    const functions = Array.from({ length: 12 }, (_, i) => ({
      name: `f${i + 1}`,
      startLine: i + 1,
      endLine: i + 1,
    }));
    const analysis = createTestPreAnalysis({
      structure: { ...emptyStructure(), functionCount: 12, functions, confidence: 'high' },
    });

    const context = new ContextBuilder().build(analysis);

    expect(context).toContain(
      '- Function names: `f1`, `f2`, `f3`, `f4`, `f5`, `f6`, `f7`, `f8`, `f9`, `f10`, ... and 2 more',
    );
  });

  it('should order issues by severity then line and cap the list', () => {
    const issues = [
      createTestIssue({ category: 'TODO_COMMENT', severity: 'LOW', line: 1, message: 'Unfinished work marker (TODO)' }),
      createTestIssue({ category: 'LONG_LINE', severity: 'LOW', line: undefined, message: 'Line is long' }),
      createTestIssue({ category: 'SECRET', severity: 'CRITICAL', line: 8, message: 'Possible hardcoded credential in TOKEN' }),
      createTestIssue({ category: 'BARE_EXCEPT', severity: 'MEDIUM', line: 4, message: 'Overly broad exception handler (bare except)' }),
    ];
    const builder = new ContextBuilder(resolvePipelineConfig({ issueDisplayCap: 3 }));

    const context = builder.build(createTestPreAnalysis({ issues }));

    expect(context.endsWith(
      [
        '## Pre-identified issues (4)',
        '- [CRITICAL] SECRET at line 8: Possible hardcoded credential in TOKEN',
        '- [MEDIUM] BARE_EXCEPT at line 4: Overly broad exception handler (bare except)',
        '- [LOW] TODO_COMMENT at line 1: Unfinished work marker (TODO)',
        '... 1 more issue(s) omitted',
        '',
      ].join('\n'),
    )).toBe(true);
  });

  it('should cut long issue messages to 160 characters', () => {
    const issues = [createTestIssue({ message: 'a'.repeat(200) })];

    const context = new ContextBuilder().build(createTestPreAnalysis({ issues }));

    expect(context).toContain(`- [LOW] DEBUG_OUTPUT at line 1: ${'a'.repeat(157)}...\n`);
  });

  it('should produce identical output for identical input', () => {
    const analysis = createTestPreAnalysis({
      issues: [createTestIssue(), createTestIssue({ line: 7 })],
    });
    const meta = { filename: 'a.js', language: 'javascript' as const, size: 10 };

    expect(new ContextBuilder().build(analysis, meta)).toBe(new ContextBuilder().build(analysis, meta));
  });

  it('should render equal output for equal copies of its inputs', () => {
    const analysis = createTestPreAnalysis({ issues: [createTestIssue({ line: 3 })] });
    const meta = { filename: 'a.js', language: 'javascript' as const, size: 10 };

    expect(new ContextBuilder().build(structuredClone(analysis), { ...meta })).toBe(
      new ContextBuilder().build(analysis, meta),
    );
  });

  it('should let meta change only the file section', () => {
    const analysis = createTestPreAnalysis({ issues: [createTestIssue({ line: 3 })] });
    const builder = new ContextBuilder();

    const first = builder.build(analysis, { filename: 'a.js', language: 'javascript', size: 10 });
    const second = builder.build(analysis, { filename: 'b.js', language: 'javascript', size: 10 });

    expect(second).not.toBe(first);
    expect(second).toBe(first.replace('- Filename: a.js\n', '- Filename: b.js\n'));
  });
});
