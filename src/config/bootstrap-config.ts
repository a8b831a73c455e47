import { promises as fs } from 'fs';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors/config-error';
import { IOError } from '../errors/io-error';
import { errorMessage } from '../errors/utils';
import { createFact } from '../facts/fact';
import { Facts } from '../facts/facts';
import { factKindSchema, factValueSchema } from '../facts/schemas';
import { Fact } from '../facts/types';
import { formatZodIssue } from '../validation/errors';

export const RepoConfigSchema = z.object({
  root: z.string().min(1, 'repo.root cannot be empty'),
  ignore: z.array(z.string()).default([]),
});

export const LlmConfigSchema = z.object({
  provider: z.string().min(1),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2).default(0.2),
});

export const SeedFactSchema = z
  .object({
    value: factValueSchema,
    scope: z.enum(['session', 'persistent']),
    kind: factKindSchema.optional(),
  })
  .strict();

export const StateConfigSchema = z
  .object({
    backend: z.enum(['memory', 'filesystem', 'sqlite']).default('memory'),
    path: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.backend !== 'memory' && !value.path) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['path'],
        message: `state.path is required for the ${value.backend} backend`,
      });
    }
  });

/**
 * Startup configuration for a session. Unknown top-level sections are kept
 * and handed to actions unchanged.
 */
export const BootstrapConfigSchema = z
  .object({
    goal: z.string().min(1).optional(),
    repo: RepoConfigSchema.optional(),
    llm: LlmConfigSchema.optional(),
    facts: z.record(z.string().min(1), SeedFactSchema).optional(),
    state: StateConfigSchema.optional(),
  })
  .passthrough();

export type BootstrapConfig = z.infer<typeof BootstrapConfigSchema>;
export type BootstrapConfigInput = z.input<typeof BootstrapConfigSchema>;
export type StateConfig = z.infer<typeof StateConfigSchema>;

export function parseBootstrapConfig(data: unknown, source = 'bootstrap config'): BootstrapConfig {
  const parsed = BootstrapConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) => formatZodIssue(issue));
    throw new ConfigError(`Invalid ${source}: ${messages.join('; ')}`, {
      source,
      issues: messages,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export async function loadBootstrapConfig(filePath: string): Promise<BootstrapConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw IOError.fromFsError(`Unable to read bootstrap config at ${filePath}`, filePath, error);
  }

  let data: unknown;
  try {
    data = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(`Malformed YAML in ${filePath}`, {
      source: filePath,
      issues: [errorMessage(error)],
      cause: error,
    });
  }

  return parseBootstrapConfig(data, filePath);
}

/**
 * Durable facts every session starts from: `goal`, `repo_root`,
 * `repo_ignore` (only when non-empty) and each entry of `facts`.
 */
export function seedFacts(config: BootstrapConfig): Facts {
  const seeds: Fact[] = [];

  if (config.goal !== undefined) {
    seeds.push(createFact('goal', config.goal, 'session'));
  }
  if (config.repo) {
    seeds.push(createFact('repo_root', config.repo.root, 'session'));
    if (config.repo.ignore.length > 0) {
      seeds.push(createFact('repo_ignore', config.repo.ignore, 'session'));
    }
  }
  for (const [key, seed] of Object.entries(config.facts ?? {})) {
    seeds.push(createFact(key, seed.value, seed.scope, seed.kind));
  }

  return Facts.of(...seeds);
}
