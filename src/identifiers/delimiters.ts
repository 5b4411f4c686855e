/**
 * Component and pack identifier delimiters.
 *
 * Full component identifier layout:
 *   [Cvendor::]Cclass[&Cbundle][:Cgroup][:Csub][&Cvariant][@Cversion]
 */

export const COMPONENT_DELIMITERS = ':&@';
export const SUFFIX_CVENDOR = '::';
export const PREFIX_CBUNDLE = '&';
export const PREFIX_CGROUP = ':';
export const PREFIX_CSUB = ':';
export const PREFIX_CVARIANT = '&';
export const PREFIX_CVERSION = '@';
export const SUFFIX_PACK_VENDOR = '::';
export const PREFIX_PACK_VERSION = '@';
