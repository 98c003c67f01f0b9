/**
 * xmpkit — Sample schemas
 *
 * Importing this module registers every schema below.
 */

export * as dc from './dc.ts';
export * as xmp from './xmp-base.ts';
export * as xmpMM from './xmp-mm.ts';
