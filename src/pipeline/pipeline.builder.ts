import { z } from 'zod';
import { PipelineDefinitionError } from './pipeline.errors';
import type { EventKind, PipelineDefinition, StageDescriptor, TriggerRule } from './pipeline.types';

const envBindingSchema = z.union([z.string(), z.object({ secret: z.string().min(1) }).strict()]);

const stageSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'must be lowercase kebab-case'),
    name: z.string().min(1),
    run: z.array(z.string().trim().min(1)).min(1).optional(),
    uses: z
      .object({
        name: z.string().min(1),
        with: z.record(z.union([envBindingSchema, z.boolean()])).optional(),
      })
      .strict()
      .optional(),
    env: z.record(envBindingSchema).optional(),
    produces: z.object({ name: z.string().min(1), path: z.string().min(1) }).strict().optional(),
    consumes: z.array(z.string().min(1)).optional(),
    failOnError: z.boolean(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict()
  .refine((stage) => (stage.run === undefined) !== (stage.uses === undefined), {
    message: 'a stage needs exactly one of run or uses',
  });

function pipelineSchema(knownActions: readonly string[]) {
  return z
    .object({
      name: z.string().min(1),
      triggers: z
        .array(
          z.object({
            kind: z.enum(['pull_request', 'push']),
            branches: z.array(z.string().min(1)).min(1),
          }),
        )
        .min(1),
      stages: z.array(stageSchema).min(1),
    })
    .superRefine((pipeline, ctx) => {
      const ids = new Set<string>();
      const produced = new Set<string>();

      pipeline.stages.forEach((stage, index) => {
        if (ids.has(stage.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['stages', index, 'id'],
            message: `duplicate stage id "${stage.id}"`,
          });
        }
        ids.add(stage.id);

        if (stage.uses && !knownActions.includes(stage.uses.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['stages', index, 'uses', 'name'],
            message: `unknown action "${stage.uses.name}"`,
          });
        }

        for (const name of stage.consumes ?? []) {
          if (!produced.has(name)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['stages', index, 'consumes'],
              message: `artifact "${name}" is not produced by an earlier stage`,
            });
          }
        }

        if (stage.produces) {
          if (produced.has(stage.produces.name)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['stages', index, 'produces', 'name'],
              message: `artifact "${stage.produces.name}" has more than one producer`,
            });
          }
          produced.add(stage.produces.name);
        }
      });
    });
}

/** Freezes a definition and everything under it. */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj);
  Object.getOwnPropertyNames(obj).forEach((prop) => {
    const value: unknown = Reflect.get(obj, prop);
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  });
  return obj;
}

export type StageInput = Omit<StageDescriptor, 'failOnError'> & { failOnError?: boolean };

/**
 * Assembles a pipeline definition and validates it before anything runs.
 * build() throws PipelineDefinitionError listing every problem found.
 */
export class PipelineBuilder {
  private readonly triggers: TriggerRule[] = [];
  private readonly stages: StageDescriptor[] = [];

  constructor(
    private readonly name: string,
    private readonly knownActions: readonly string[] = [],
  ) {}

  on(kind: EventKind, branches: readonly string[]): this {
    this.triggers.push({ kind, branches: [...branches] });
    return this;
  }

  stage(input: StageInput): this {
    this.stages.push({ ...input, failOnError: input.failOnError ?? true });
    return this;
  }

  build(): PipelineDefinition {
    return parsePipelineDefinition(
      { name: this.name, triggers: this.triggers, stages: this.stages },
      this.knownActions,
    );
  }
}

/** Validates a candidate definition (built in code or loaded from JSON). */
export function parsePipelineDefinition(
  candidate: unknown,
  knownActions: readonly string[] = [],
): PipelineDefinition {
  const parsed = pipelineSchema(knownActions).safeParse(candidate);
  if (!parsed.success) {
    throw new PipelineDefinitionError(
      parsed.error.issues.map((issue) =>
        issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }
  const definition: PipelineDefinition = parsed.data;
  return deepFreeze(definition);
}
