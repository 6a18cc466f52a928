/**
 * Tests for pipeline ordering and aggregation, using fake tools.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  ValidationPipeline,
  STAGE_PLANS,
  computeExitCode,
  createPipeline,
  type DocFileSet,
  type Formatter,
  type PipelineTools,
  type ProseLinter,
  type StageKind,
  type StructuralLinter,
  type ToolReport,
} from '../../../../src/core/pipeline/index.js';
import { getDefaultConfig } from '../../../../src/core/config/index.js';
import type { CommandRunner } from '../../../../src/utils/process.js';

function report(stage: StageKind, overrides: Partial<ToolReport> = {}): ToolReport {
  return {
    tool: stage,
    stage,
    passed: true,
    advisory: false,
    exitCode: 0,
    detail: '',
    files: 0,
    ...overrides,
  };
}

interface FakeOutcome {
  exitCode?: number;
  advisory?: boolean;
  throws?: Error;
}

function fakeTools(outcomes: Partial<Record<StageKind, FakeOutcome>> = {}, calls: string[] = []) {
  const run = (stage: StageKind) =>
    vi.fn(async (paths: string[]): Promise<ToolReport> => {
      calls.push(stage);
      const outcome = outcomes[stage] ?? {};
      if (outcome.throws) throw outcome.throws;
      const exitCode = outcome.exitCode ?? 0;
      return report(stage, {
        passed: exitCode === 0,
        exitCode,
        advisory: outcome.advisory ?? false,
        files: paths.length,
        detail: `${stage} output`,
      });
    });

  const advisory = (stage: StageKind) => outcomes[stage]?.advisory ?? false;
  const checkFormatter: Formatter = {
    name: 'format-check', kind: 'formatter', writes: false, advisory: advisory('format-check'), run: run('format-check'),
  };
  const writeFormatter: Formatter = {
    name: 'format-write', kind: 'formatter', writes: true, advisory: advisory('format-write'), run: run('format-write'),
  };
  const structuralLinter: StructuralLinter = {
    name: 'structural-lint', kind: 'structural-linter', advisory: advisory('structural-lint'), run: run('structural-lint'),
  };
  const proseLinter: ProseLinter = {
    name: 'prose-lint', kind: 'prose-linter', advisory: advisory('prose-lint'), run: run('prose-lint'),
  };
  const tools: PipelineTools = { checkFormatter, writeFormatter, structuralLinter, proseLinter };
  return { tools, calls };
}

const FILES: DocFileSet = {
  all: ['CLAUDE.md', 'README.md', 'how/git.md', 'why/naming.md'],
  prose: ['CLAUDE.md', 'README.md'],
};

const fileSource = async (): Promise<DocFileSet> => FILES;

describe('STAGE_PLANS', () => {
  it('should format before linting in fix mode', () => {
    expect(STAGE_PLANS.fix).toEqual(['format-write', 'structural-lint', 'prose-lint']);
  });

  it('should never include a writing stage in check mode', () => {
    expect(STAGE_PLANS.check).not.toContain('format-write');
  });
});

describe('computeExitCode', () => {
  it('should be 0 when everything passed', () => {
    expect(computeExitCode([report('format-check'), report('prose-lint')])).toBe(0);
  });

  it('should propagate the first mandatory failure', () => {
    expect(computeExitCode([
      report('format-check', { passed: false, exitCode: 2 }),
      report('structural-lint', { passed: false, exitCode: 1 }),
    ])).toBe(2);
  });

  it('should ignore advisory failures', () => {
    expect(computeExitCode([report('prose-lint', { passed: false, exitCode: 1, advisory: true })])).toBe(0);
  });

  it('should use 1 for a failure reported with exit code 0', () => {
    expect(computeExitCode([report('structural-lint', { passed: false, exitCode: 0 })])).toBe(1);
  });
});

describe('ValidationPipeline', () => {
  it('should run check stages in order', async () => {
    const { tools, calls } = fakeTools();
    const pipeline = new ValidationPipeline(tools, fileSource);

    const result = await pipeline.run('check');

    expect(calls).toEqual(['format-check', 'structural-lint', 'prose-lint']);
    expect(result).toMatchObject({ mode: 'check', exitCode: 0, passed: true });
    expect(result.reports.map((r) => r.stage)).toEqual(calls);
  });

  it('should never call the writing formatter in check mode', async () => {
    const { tools } = fakeTools({ 'format-check': { exitCode: 1 } });
    const pipeline = new ValidationPipeline(tools, fileSource);

    await pipeline.run('check');

    expect(tools.writeFormatter.run).not.toHaveBeenCalled();
  });

  it('should run format-write before the linters in fix mode', async () => {
    const { tools, calls } = fakeTools();

    await new ValidationPipeline(tools, fileSource).run('fix');

    expect(calls).toEqual(['format-write', 'structural-lint', 'prose-lint']);
  });

  it('should hand the curated subset to the prose linter only', async () => {
    const { tools } = fakeTools();

    await new ValidationPipeline(tools, fileSource).run('lint');

    expect(tools.structuralLinter.run).toHaveBeenCalledWith(FILES.all);
    expect(tools.proseLinter.run).toHaveBeenCalledWith(FILES.prose);
  });

  it('should keep going after a failed stage', async () => {
    const { tools, calls } = fakeTools({ 'format-check': { exitCode: 2 }, 'structural-lint': { exitCode: 1 } });

    const result = await new ValidationPipeline(tools, fileSource).run('check');

    expect(calls).toHaveLength(3);
    expect(result.reports.map((r) => r.passed)).toEqual([false, false, true]);
    expect(result.exitCode).toBe(2);
    expect(result.passed).toBe(false);
  });

  it('should turn a crashing stage into a failed report', async () => {
    const { tools, calls } = fakeTools({ 'structural-lint': { throws: new Error('spawn failed') } });

    const result = await new ValidationPipeline(tools, fileSource).run('lint');

    expect(calls).toEqual(['structural-lint', 'prose-lint']);
    expect(result.reports[0]).toEqual({
      tool: 'structural-lint',
      stage: 'structural-lint',
      passed: false,
      advisory: false,
      exitCode: 1,
      detail: 'spawn failed',
      files: 4,
    });
    expect(result.exitCode).toBe(1);
  });

  it('should keep an advisory tool advisory when it crashes', async () => {
    const { tools } = fakeTools({ 'prose-lint': { throws: new Error('vale crashed'), advisory: true } });

    const result = await new ValidationPipeline(tools, fileSource).run('lint');

    expect(result.reports[1]).toMatchObject({ stage: 'prose-lint', passed: false, advisory: true, detail: 'vale crashed' });
    expect(result.exitCode).toBe(0);
    expect(result.passed).toBe(true);
  });

  it('should pass when only an advisory stage fails', async () => {
    const { tools } = fakeTools({ 'prose-lint': { exitCode: 1, advisory: true } });

    const result = await new ValidationPipeline(tools, fileSource).run('check');

    expect(result.exitCode).toBe(0);
    expect(result.reports[2].passed).toBe(false);
  });

  it('should run only the formatter in format mode', async () => {
    const { tools, calls } = fakeTools();

    await new ValidationPipeline(tools, fileSource).run('format');

    expect(calls).toEqual(['format-write']);
  });
});

describe('fix / check on a real tree', () => {
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = join(tmpdir(), `guidesmith-pipeline-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(join(projectRoot, 'how'), { recursive: true });
    writeFileSync(join(projectRoot, 'README.md'), '# Notes\n');
    writeFileSync(join(projectRoot, 'how', 'git.md'), '# Git   \n\ntext\n\n\n');
  });

  afterEach(() => {
    rmSync(projectRoot, { recursive: true, force: true });
  });

  /**
   * Stand-in formatter: trims trailing whitespace and collapses trailing
   * blank lines, the way an idempotent formatter would.
   */
  const format = (text: string): string =>
    text.split('\n').map((line) => line.trimEnd()).join('\n').replace(/\n+$/, '') + '\n';

  const fakeRunner: CommandRunner = async (command, args, { cwd }) => {
    if (command.endsWith('prettier')) {
      const write = args[0] === '--write';
      const files = args.filter((a) => a.endsWith('.md'));
      const dirty = files.filter((f) => {
        const content = readFileSync(join(cwd, f), 'utf-8');
        return format(content) !== content;
      });
      if (write) {
        for (const f of dirty) {
          writeFileSync(join(cwd, f), format(readFileSync(join(cwd, f), 'utf-8')));
        }
        return { exitCode: 0, output: files.join('\n') };
      }
      return { exitCode: dirty.length > 0 ? 1 : 0, output: dirty.map((f) => `[warn] ${f}`).join('\n') };
    }
    return { exitCode: 0, output: '' };
  };

  const snapshotTree = () => ({
    readme: readFileSync(join(projectRoot, 'README.md'), 'utf-8'),
    git: readFileSync(join(projectRoot, 'how', 'git.md'), 'utf-8'),
  });

  it('should not modify any file in check mode, even when failing', async () => {
    const before = snapshotTree();
    const pipeline = createPipeline(projectRoot, getDefaultConfig(), fakeRunner);

    const result = await pipeline.run('check');

    expect(result.exitCode).toBe(1);
    expect(result.reports[0].detail).toBe('[warn] how/git.md');
    expect(snapshotTree()).toEqual(before);
  });

  it('should be idempotent across two fix runs', async () => {
    const pipeline = createPipeline(projectRoot, getDefaultConfig(), fakeRunner);

    const first = await pipeline.run('fix');
    const afterFirst = snapshotTree();
    const second = await pipeline.run('fix');

    expect(first.exitCode).toBe(0);
    expect(second.exitCode).toBe(0);
    expect(afterFirst.git).toBe('# Git\n\ntext\n');
    expect(snapshotTree()).toEqual(afterFirst);
    expect((await pipeline.run('check')).exitCode).toBe(0);
  });
});
