/**
 * Extractors
 *
 * One implementation per ExtractorKind.
 */

import type { Extractor, ExtractorKind } from '../types.js';
import { braceExtractor, findClassMembers } from './brace-extractor.js';
import { declarationExtractor, findDeclarationMembers } from './declaration-extractor.js';
import { genericExtractor } from './generic-extractor.js';
import { indentationExtractor, parsePython } from './indentation-extractor.js';

export const EXTRACTORS: Record<ExtractorKind, Extractor> = {
  indentation: indentationExtractor,
  brace: braceExtractor,
  declaration: declarationExtractor,
  generic: genericExtractor,
};

export {
  braceExtractor,
  declarationExtractor,
  genericExtractor,
  indentationExtractor,
  findClassMembers,
  findDeclarationMembers,
  parsePython,
};
