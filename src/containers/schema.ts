/**
 * Container spec validation
 */

import { z } from 'zod';
import { Success, Failure, type Result } from '@/types';
import type { ContainerSpec } from './types';

const mountSchema = z.object({
  source: z.string().min(1, 'mount source is required'),
  target: z.string().startsWith('/', 'mount target must be an absolute path'),
  type: z.enum(['bind', 'volume']).default('bind'),
  readOnly: z.boolean().default(false),
});

export const containerSpecSchema = z
  .object({
    image: z.string().min(1, 'image is required'),
    name: z
      .string()
      .regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/, 'invalid container name')
      .optional(),
    ports: z
      .record(
        z.string().regex(/^\d+(\/(tcp|udp|sctp))?$/, 'container port must look like 8080 or 8080/udp'),
        z.number().int().min(0).max(65535),
      )
      .default({}),
    env: z.array(z.string().regex(/^[^=]+=/, 'environment entries must be KEY=VALUE')).default([]),
    mounts: z.array(mountSchema).default([]),
    command: z.array(z.string()).optional(),
    reuse: z.boolean().default(false),
  })
  .refine((spec) => !spec.reuse || spec.name !== undefined, {
    message: 'a container name is required when reuse is enabled',
    path: ['name'],
  });

/**
 * Caller-facing spec shape: everything but `image` is optional.
 */
export type ContainerSpecInput = z.input<typeof containerSpecSchema>;

/**
 * Validate caller input and freeze it into a `ContainerSpec`.
 */
export function parseContainerSpec(input: ContainerSpecInput): Result<ContainerSpec> {
  const parsed = containerSpecSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    return Failure(`Invalid container spec: ${issues.join('; ')}`, {
      message: 'Invalid container spec',
      details: { issues },
    });
  }

  const data = parsed.data;
  const spec: ContainerSpec = {
    image: data.image,
    ports: Object.freeze({ ...data.ports }),
    env: Object.freeze([...data.env]),
    mounts: Object.freeze(data.mounts.map((mount) => Object.freeze({ ...mount }))),
    reuse: data.reuse,
    ...(data.name !== undefined && { name: data.name }),
    ...(data.command !== undefined && { command: Object.freeze([...data.command]) }),
  };

  return Success(Object.freeze(spec));
}
