import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PipelineRunnerService } from '../pipeline/pipeline-runner.service';
import { SecretStore } from '../pipeline/secret-store';
import { builtinActions, RecordingSink, ScriptedExecutor } from '../testing/fakes';
import type { ScriptedCommand } from '../testing/fakes';
import { createChecksWorkflow } from './checks.workflow';

const COVERAGE_COMMAND = 'pytest --cache-clear --cov=. --cov-report=xml tests > pytest-coverage.xml';

describe('createChecksWorkflow', () => {
  const workflow = createChecksWorkflow();

  it('declares the stages in order', () => {
    expect(workflow.stages.map((stage) => stage.name)).toEqual([
      'Checkout',
      'Set up Python',
      'Set up requirements',
      'Unit Tests',
      'Static tests',
      'Generate coverage report',
      'Upload coverage to Codecov',
    ]);
    expect(workflow.stages[2].run).toEqual([
      'python -m pip install --upgrade pip',
      'pip install pytest pytest-cov mypy',
      'pip install -r requirements.txt',
    ]);
    expect(workflow.stages[4].run).toEqual(['mypy SpaceBattle']);
    expect(workflow.stages[6].failOnError).toBe(true);
  });

  it('is frozen once built', () => {
    expect(Object.isFrozen(workflow)).toBe(true);
    expect(Object.isFrozen(workflow.stages[3])).toBe(true);
  });

  it.each([
    ['pull_request', 'main', true],
    ['pull_request', 'develop', true],
    ['pull_request', 'release', false],
    ['push', 'develop', true],
    ['push', 'main', false],
    ['push', 'feature-x', false],
  ] as const)('%s to %s triggers: %s', (kind, branch, expected) => {
    const runner = new PipelineRunnerService(new ScriptedExecutor(), builtinActions(new RecordingSink()));
    expect(runner.evaluate(workflow, { kind, branch })).toBe(expected);
  });

  describe('run', () => {
    let workspaceDir: string;

    beforeEach(() => {
      workspaceDir = mkdtempSync(join(tmpdir(), 'checks-'));
    });

    afterEach(() => {
      rmSync(workspaceDir, { recursive: true, force: true });
    });

    function script(overrides: Record<string, ScriptedCommand> = {}) {
      return new ScriptedExecutor({
        'python --version 2>&1': { output: ['Python 3.9.18'] },
        [COVERAGE_COMMAND]: {
          effect: (options) => writeFileSync(join(options.cwd, 'pytest-coverage.xml'), '<coverage/>'),
        },
        ...overrides,
      });
    }

    it('uploads the coverage report with the unittests flag when every check passes', async () => {
      const sink = new RecordingSink();
      const runner = new PipelineRunnerService(script(), builtinActions(sink));

      const result = await runner.execute(workflow, {
        event: { kind: 'pull_request', branch: 'main' },
        secrets: new SecretStore({ CODECOV_TOKEN: 'test-token' }),
        workspaceDir,
      });

      expect(result.status).toBe('succeeded');
      expect(result.completedStages).toHaveLength(7);
      expect(sink.uploads).toHaveLength(1);
      expect(sink.uploads[0]).toMatchObject({
        token: 'test-token',
        flags: ['unittests'],
        branch: 'main',
        artifact: {
          name: 'coverage-report',
          path: join(workspaceDir, 'pytest-coverage.xml'),
          producedBy: 'coverage',
        },
      });
    });

    it('never reaches coverage or upload when the type check fails', async () => {
      const sink = new RecordingSink();
      const executor = script({ 'mypy SpaceBattle': { exitCode: 1 } });
      const runner = new PipelineRunnerService(executor, builtinActions(sink));

      const result = await runner.execute(workflow, {
        event: { kind: 'push', branch: 'develop' },
        secrets: new SecretStore({ CODECOV_TOKEN: 'test-token' }),
        workspaceDir,
      });

      expect(result.status).toBe('failed');
      expect(result.failedStage?.name).toBe('Static tests');
      expect(result.stages.slice(5).map((stage) => stage.status)).toEqual(['not_run', 'not_run']);
      expect(executor.commands).not.toContain(COVERAGE_COMMAND);
      expect(sink.uploads).toEqual([]);
    });

    it('fails on the upload stage when CODECOV_TOKEN is absent', async () => {
      const sink = new RecordingSink();
      const runner = new PipelineRunnerService(script(), builtinActions(sink));

      const result = await runner.execute(workflow, {
        event: { kind: 'pull_request', branch: 'develop' },
        secrets: new SecretStore(),
        workspaceDir,
      });

      expect(result.status).toBe('failed');
      expect(result.completedStages).toHaveLength(6);
      expect(result.failedStage).toEqual({
        id: 'upload-coverage',
        name: 'Upload coverage to Codecov',
        error: { code: 'MISSING_SECRET', message: 'Required secret CODECOV_TOKEN is not set' },
      });
      expect(sink.uploads).toEqual([]);
    });

    it('fails setup when the interpreter is not the pinned version', async () => {
      const runner = new PipelineRunnerService(
        script({ 'python --version 2>&1': { output: ['Python 3.11.4'] } }),
        builtinActions(new RecordingSink()),
      );

      const result = await runner.execute(workflow, {
        event: { kind: 'push', branch: 'develop' },
        secrets: new SecretStore({ CODECOV_TOKEN: 'test-token' }),
        workspaceDir,
      });

      expect(result.failedStage?.id).toBe('setup-python');
      expect(result.failedStage?.error.message).toBe('Expected Python 3.9, found 3.11.4');
    });
  });
});
