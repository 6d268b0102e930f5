import { PipelineBuilder, parsePipelineDefinition } from './pipeline.builder';
import { PipelineDefinitionError } from './pipeline.errors';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof PipelineDefinitionError) return err.issues;
    throw err;
  }
  throw new Error('expected a PipelineDefinitionError');
}

describe('PipelineBuilder', () => {
  it('defaults stages to failure-fatal', () => {
    const definition = new PipelineBuilder('p')
      .on('push', ['develop'])
      .stage({ id: 'a', name: 'A', run: ['true'] })
      .build();

    expect(definition.stages[0].failOnError).toBe(true);
  });

  it('rejects a pipeline without triggers or stages', () => {
    expect(issuesOf(() => new PipelineBuilder('p').build())).toEqual([
      'triggers: Array must contain at least 1 element(s)',
      'stages: Array must contain at least 1 element(s)',
    ]);
  });

  it('rejects a stage with both run and uses', () => {
    const issues = issuesOf(() =>
      new PipelineBuilder('p', ['checkout'])
        .on('push', ['develop'])
        .stage({ id: 'a', name: 'A', run: ['true'], uses: { name: 'checkout' } })
        .build(),
    );

    expect(issues).toEqual(['stages.0: a stage needs exactly one of run or uses']);
  });

  it('rejects unknown actions, duplicate ids and unproduced artifacts', () => {
    const issues = issuesOf(() =>
      new PipelineBuilder('p', ['checkout'])
        .on('pull_request', ['main'])
        .stage({ id: 'a', name: 'A', uses: { name: 'deploy' } })
        .stage({ id: 'a', name: 'Again', run: ['true'], consumes: ['report'] })
        .build(),
    );

    expect(issues).toEqual([
      'stages.0.uses.name: unknown action "deploy"',
      'stages.1.id: duplicate stage id "a"',
      'stages.1.consumes: artifact "report" is not produced by an earlier stage',
    ]);
  });

  it('rejects an artifact consumed before it is produced', () => {
    const issues = issuesOf(() =>
      new PipelineBuilder('p')
        .on('push', ['develop'])
        .stage({ id: 'use', name: 'Use', run: ['cat r.xml'], consumes: ['r'] })
        .stage({ id: 'make', name: 'Make', run: ['touch r.xml'], produces: { name: 'r', path: 'r.xml' } })
        .build(),
    );

    expect(issues).toEqual(['stages.0.consumes: artifact "r" is not produced by an earlier stage']);
  });

  it('rejects an artifact with two producers', () => {
    const issues = issuesOf(() =>
      new PipelineBuilder('p')
        .on('push', ['develop'])
        .stage({ id: 'one', name: 'One', run: ['x'], produces: { name: 'r', path: 'a.xml' } })
        .stage({ id: 'two', name: 'Two', run: ['y'], produces: { name: 'r', path: 'b.xml' } })
        .build(),
    );

    expect(issues).toEqual(['stages.1.produces.name: artifact "r" has more than one producer']);
  });
});

describe('parsePipelineDefinition', () => {
  it('accepts a definition loaded as plain data', () => {
    const definition = parsePipelineDefinition({
      name: 'from-json',
      triggers: [{ kind: 'push', branches: ['develop'] }],
      stages: [{ id: 'test', name: 'Test', run: ['npm test'], failOnError: true }],
    });

    expect(definition.stages[0].run).toEqual(['npm test']);
    expect(Object.isFrozen(definition.triggers[0].branches)).toBe(true);
  });

  it('rejects an unsupported event kind', () => {
    expect(() =>
      parsePipelineDefinition({
        name: 'bad',
        triggers: [{ kind: 'tag', branches: ['v1'] }],
        stages: [{ id: 'test', name: 'Test', run: ['npm test'], failOnError: true }],
      }),
    ).toThrow(PipelineDefinitionError);
  });
});
