/**
 * Kubernetes object metadata
 *
 * Only the fields the accessors read are modelled; everything else passes through.
 */

import { z } from 'zod';

export const ownerReferenceSchema = z.object({
  apiVersion: z.string(),
  kind: z.string(),
  name: z.string(),
  uid: z.string().optional(),
});

export type OwnerReference = z.infer<typeof ownerReferenceSchema>;

export const objectMetaSchema = z.object({
  name: z.string(),
  namespace: z.string().optional(),
  uid: z.string().optional(),
  annotations: z.record(z.string()).default({}),
  labels: z.record(z.string()).default({}),
  ownerReferences: z.array(ownerReferenceSchema).default([]),
  generation: z.number().int().optional(),
});

export type ObjectMeta = z.infer<typeof objectMetaSchema>;

export const kubeObjectSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.string().optional(),
  metadata: objectMetaSchema,
});

export type KubeObject = z.infer<typeof kubeObjectSchema>;

export const podObjectSchema = kubeObjectSchema.extend({
  status: z
    .object({
      phase: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export type PodObject = z.infer<typeof podObjectSchema>;

export const nodeListSchema = z.object({
  items: z.array(
    z.object({
      metadata: z.object({ name: z.string() }),
      status: z
        .object({
          conditions: z.array(z.object({ type: z.string(), status: z.string() })).default([]),
        })
        .default({}),
    }),
  ),
});

export const podListSchema = z.object({
  items: z.array(podObjectSchema),
});

export const pvcSchema = kubeObjectSchema.extend({
  status: z
    .object({
      phase: z.string().optional(),
      accessModes: z.array(z.string()).optional(),
      capacity: z.record(z.string()).optional(),
    })
    .passthrough()
    .default({}),
});

export type PersistentVolumeClaimObject = z.infer<typeof pvcSchema>;

/**
 * Reference to the object named by an owner reference.
 */
export interface ObjectReference {
  apiVersion: string;
  kind: string;
  name: string;
  uid?: string;
}

export function toObjectReference(owner: OwnerReference): ObjectReference {
  const reference: ObjectReference = {
    apiVersion: owner.apiVersion,
    kind: owner.kind,
    name: owner.name,
  };
  if (owner.uid) {
    reference.uid = owner.uid;
  }
  return reference;
}
