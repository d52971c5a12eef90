/**
 * Loads the static code lists (fund types, statement categories, entity
 * types, counties) shipped in data/reference-codes.json.
 */

import fs from 'node:fs';

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';

import type { ReferenceCodes } from '../../core/types.js';

const LabelMap = Type.Record(Type.String(), Type.String());

const ReferenceCodesSchema = Type.Object({
  fundTypes: LabelMap,
  revenueCategories: LabelMap,
  expenditureCategories: LabelMap,
  fundBalanceCategories: LabelMap,
  debtInstruments: Type.Object({
    generalObligationBonds: Type.String(),
    revenueBonds: Type.String(),
    alternateRevenueBonds: Type.String(),
    contractual: Type.String(),
    other: Type.String(),
  }),
  pensionSystems: Type.Object({
    imrf: Type.String(),
    police: Type.String(),
    fire: Type.String(),
  }),
  entityTypes: LabelMap,
  counties: Type.Array(Type.String()),
});

const validator = TypeCompiler.Compile(ReferenceCodesSchema);

// src/ and dist/ sit at the same depth below the project root
export const DEFAULT_REFERENCE_CODES_URL = new URL(
  '../../../../../data/reference-codes.json',
  import.meta.url
);

let cached: ReferenceCodes | null = null;

/**
 * Reads and validates the code lists. Throws on a missing or malformed file:
 * the server cannot label anything without them.
 */
export const loadReferenceCodes = (source: URL = DEFAULT_REFERENCE_CODES_URL): ReferenceCodes => {
  if (cached !== null && source === DEFAULT_REFERENCE_CODES_URL) {
    return cached;
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(source, 'utf8'));
  if (!validator.Check(parsed)) {
    const details = [...validator.Errors(parsed)]
      .map((e) => `${e.path}: ${e.message}`)
      .join(', ');
    throw new Error(`Invalid reference codes at ${source.pathname}: ${details}`);
  }

  if (source === DEFAULT_REFERENCE_CODES_URL) {
    cached = parsed;
  }
  return parsed;
};

