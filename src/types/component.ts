/**
 * Attribute records for components, conditions and packs.
 *
 * Records come from the metadata provider as opaque attribute bags; the
 * schemas below are the contract this core reads from them.
 */

import { z } from 'zod';

/**
 * Component attribute schema.
 * Only the class name is mandatory; absent fields are elided from identifiers.
 */
export const ComponentAttributesSchema = z.object({
  /** Component vendor (Cvendor) */
  vendor: z.string().optional(),

  /** Component class (Cclass) */
  cclass: z.string(),

  /** Bundle name (Cbundle) */
  bundle: z.string().optional(),

  /** Group name (Cgroup) */
  group: z.string().optional(),

  /** Sub-group name (Csub) */
  sub: z.string().optional(),

  /** Variant name (Cvariant) */
  variant: z.string().optional(),

  /** Component version (Cversion) */
  version: z.string().optional(),
});

export type ComponentAttributes = z.infer<typeof ComponentAttributesSchema>;

/**
 * Condition schema: component attributes plus the element tag
 * (require, accept, deny, ...).
 */
export const ConditionAttributesSchema = ComponentAttributesSchema.extend({
  tag: z.string(),
});

export type ConditionAttributes = z.infer<typeof ConditionAttributesSchema>;

/**
 * Pack attribute schema.
 */
export const PackAttributesSchema = z.object({
  vendor: z.string().optional(),
  name: z.string(),
  version: z.string().optional(),
});

export type PackAttributes = z.infer<typeof PackAttributesSchema>;
