/**
 * Component identifier decomposition.
 */

import { ComponentAttributesSchema } from '../types/component.js';
import type { ComponentAttributes } from '../types/component.js';
import {
  SUFFIX_CVENDOR,
  PREFIX_CBUNDLE,
  PREFIX_CGROUP,
  PREFIX_CVARIANT,
  PREFIX_CVERSION,
} from './delimiters.js';

/**
 * Split at the first occurrence of a delimiter.
 * Returns [whole, ''] when the delimiter is absent.
 */
function splitFirst(value: string, delimiter: string): [string, string] {
  const index = value.indexOf(delimiter);
  if (index === -1) {
    return [value, ''];
  }
  return [value.slice(0, index), value.slice(index + delimiter.length)];
}

/**
 * Split at the last occurrence of a delimiter.
 * Returns [whole, ''] when the delimiter is absent.
 */
function splitLast(value: string, delimiter: string): [string, string] {
  const index = value.lastIndexOf(delimiter);
  if (index === -1) {
    return [value, ''];
  }
  return [value.slice(0, index), value.slice(index + delimiter.length)];
}

/**
 * Decompose a full component identifier into its attributes.
 *
 * Never fails: malformed input yields partially populated attributes.
 * `cclass` is always set (possibly ''), other fields only when non-empty.
 * Segments beyond `Csub` are ignored.
 *
 * A variant may trail either the group or the sub segment. If both carry
 * one, the sub segment's variant wins.
 *
 * @param componentId - Identifier as built by getComponentId
 * @returns Component attributes
 */
export function componentAttributesFromId(componentId: string): ComponentAttributes {
  const attributes: ComponentAttributes = { cclass: '' };
  let id = componentId;

  if (id.includes(SUFFIX_CVENDOR)) {
    const [vendor, rest] = splitFirst(id, SUFFIX_CVENDOR);
    setIfPresent(attributes, 'vendor', vendor);
    id = rest;
  }

  const [body, version] = splitLast(id, PREFIX_CVERSION);
  setIfPresent(attributes, 'version', version);

  const segments = body.split(PREFIX_CGROUP);
  segments.slice(0, 3).forEach((segment, index) => {
    switch (index) {
      case 0: {
        const [cclass, bundle] = splitFirst(segment, PREFIX_CBUNDLE);
        attributes.cclass = cclass;
        setIfPresent(attributes, 'bundle', bundle);
        break;
      }
      case 1: {
        const [group, variant] = splitFirst(segment, PREFIX_CVARIANT);
        setIfPresent(attributes, 'group', group);
        setIfPresent(attributes, 'variant', variant);
        break;
      }
      default: {
        const [sub, variant] = splitFirst(segment, PREFIX_CVARIANT);
        setIfPresent(attributes, 'sub', sub);
        if (variant && attributes.variant) {
          console.warn(
            `[ComponentId] Variant given on both group and sub in '${componentId}', using '${variant}'`
          );
        }
        setIfPresent(attributes, 'variant', variant);
        break;
      }
    }
  });

  return attributes;
}

/**
 * Validate an opaque metadata record as component attributes.
 * Throws on validation failure.
 *
 * @param input - Record from the metadata provider
 * @returns Typed component attributes
 */
export function parseComponentAttributes(input: unknown): ComponentAttributes {
  return ComponentAttributesSchema.parse(input);
}

function setIfPresent(
  attributes: ComponentAttributes,
  field: Exclude<keyof ComponentAttributes, 'cclass'>,
  value: string
): void {
  if (value) {
    attributes[field] = value;
  }
}
