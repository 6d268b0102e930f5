import { BUILTIN_ACTION_NAMES } from '../actions/action-registry';
import { PipelineBuilder } from '../pipeline/pipeline.builder';
import type { PipelineDefinition } from '../pipeline/pipeline.types';

export const CODECOV_TOKEN = 'CODECOV_TOKEN';
export const COVERAGE_ARTIFACT = 'coverage-report';

export interface ChecksWorkflowOptions {
  pythonVersion?: string;
  /** Package passed to the type checker. */
  modulePath?: string;
  testsDir?: string;
  requirementsFile?: string;
  coverageFile?: string;
  coverageFlags?: string;
}

/**
 * The "Checks Workflow": install, test, type-check, measure coverage and upload it.
 * Runs for pull requests into main or develop and for pushes to develop.
 */
export function createChecksWorkflow(options: ChecksWorkflowOptions = {}): PipelineDefinition {
  const {
    pythonVersion = '3.9',
    modulePath = 'SpaceBattle',
    testsDir = 'tests',
    requirementsFile = 'requirements.txt',
    coverageFile = 'pytest-coverage.xml',
    coverageFlags = 'unittests',
  } = options;

  return new PipelineBuilder('Checks Workflow', BUILTIN_ACTION_NAMES)
    .on('pull_request', ['main', 'develop'])
    .on('push', ['develop'])
    .stage({ id: 'checkout', name: 'Checkout', uses: { name: 'checkout' } })
    .stage({
      id: 'setup-python',
      name: 'Set up Python',
      uses: { name: 'setup-python', with: { 'python-version': pythonVersion } },
    })
    .stage({
      id: 'requirements',
      name: 'Set up requirements',
      run: [
        'python -m pip install --upgrade pip',
        'pip install pytest pytest-cov mypy',
        `pip install -r ${requirementsFile}`,
      ],
    })
    .stage({ id: 'unit-tests', name: 'Unit Tests', run: [`pytest ${testsDir}`] })
    .stage({ id: 'static-tests', name: 'Static tests', run: [`mypy ${modulePath}`] })
    .stage({
      id: 'coverage',
      name: 'Generate coverage report',
      run: [`pytest --cache-clear --cov=. --cov-report=xml ${testsDir} > ${coverageFile}`],
      produces: { name: COVERAGE_ARTIFACT, path: coverageFile },
    })
    .stage({
      id: 'upload-coverage',
      name: 'Upload coverage to Codecov',
      uses: {
        name: 'codecov',
        with: {
          token: { secret: CODECOV_TOKEN },
          artifact: COVERAGE_ARTIFACT,
          flags: coverageFlags,
        },
      },
      consumes: [COVERAGE_ARTIFACT],
      // fail_ci_if_error
      failOnError: true,
    })
    .build();
}
