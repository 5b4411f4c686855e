/**
 * Component, condition and package identifiers.
 */

import type {
  ComponentAttributes,
  ConditionAttributes,
  PackAttributes,
} from '../types/component.js';
import { constructId, withSuffix } from './construct.js';
import {
  SUFFIX_CVENDOR,
  PREFIX_CBUNDLE,
  PREFIX_CGROUP,
  PREFIX_CSUB,
  PREFIX_CVARIANT,
  PREFIX_CVERSION,
  SUFFIX_PACK_VENDOR,
  PREFIX_PACK_VERSION,
} from './delimiters.js';

/**
 * Fully specified component identifier:
 * `Cvendor::Cclass&Cbundle:Cgroup:Csub&Cvariant@Cversion`.
 *
 * @param component - Component attributes
 * @returns Identifier, or '' when no component is given
 */
export function getComponentId(component: ComponentAttributes | undefined): string {
  if (!component) {
    return '';
  }
  return constructId([
    ['', withSuffix(component.vendor, SUFFIX_CVENDOR)],
    ['', component.cclass],
    [PREFIX_CBUNDLE, component.bundle],
    [PREFIX_CGROUP, component.group],
    [PREFIX_CSUB, component.sub],
    [PREFIX_CVARIANT, component.variant],
    [PREFIX_CVERSION, component.version],
  ]);
}

/**
 * Condition identifier: `<tag> <component id>`.
 *
 * @param condition - Condition expression attributes
 * @returns Identifier, or '' when no condition is given
 */
export function getConditionId(condition: ConditionAttributes | undefined): string {
  if (!condition) {
    return '';
  }
  return `${condition.tag} ${getComponentId(condition)}`;
}

/**
 * Component aggregate identifier (variant and version excluded).
 * Names the family of all variants and versions of a component.
 *
 * @param component - Component attributes
 * @returns Identifier, or '' when no component is given
 */
export function getComponentAggregateId(component: ComponentAttributes | undefined): string {
  if (!component) {
    return '';
  }
  return constructId([
    ['', withSuffix(component.vendor, SUFFIX_CVENDOR)],
    ['', component.cclass],
    [PREFIX_CBUNDLE, component.bundle],
    [PREFIX_CGROUP, component.group],
    [PREFIX_CSUB, component.sub],
  ]);
}

/**
 * Partial component identifier (vendor and version excluded).
 * Identifies a component regardless of the pack supplying it.
 *
 * @param component - Component attributes
 * @returns Identifier, or '' when no component is given
 */
export function getPartialComponentId(component: ComponentAttributes | undefined): string {
  if (!component) {
    return '';
  }
  return constructId([
    ['', component.cclass],
    [PREFIX_CBUNDLE, component.bundle],
    [PREFIX_CGROUP, component.group],
    [PREFIX_CSUB, component.sub],
    [PREFIX_CVARIANT, component.variant],
  ]);
}

/**
 * Package identifier: `Vendor::Name@Version`.
 *
 * @param pack - Pack attributes
 * @returns Identifier, or '' when no pack is given
 */
export function getPackageId(pack: PackAttributes | undefined): string {
  if (!pack) {
    return '';
  }
  return formatPackageId(pack.vendor, pack.name, pack.version);
}

/**
 * Package identifier from loose strings.
 */
export function formatPackageId(
  vendor: string | undefined,
  name: string,
  version: string | undefined
): string {
  return constructId([
    ['', withSuffix(vendor, SUFFIX_PACK_VENDOR)],
    ['', name],
    [PREFIX_PACK_VERSION, version],
  ]);
}
