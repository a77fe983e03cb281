/**
 * Taxonomy Loader
 *
 * Loads and caches the category and attribute hierarchies from
 * taxonomy-v1.json. The file is read once per cold start.
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from '../config';
import { RawHierarchy, TaxonomyFile, TaxonomyFileSchema, ValidationError } from '../types';
import { getLogger } from './logger';

const logger = getLogger();

const TAXONOMY_FILE = 'data/taxonomy/taxonomy-v1.json';

let cachedTaxonomy: TaxonomyFile | null = null;

function candidatePaths(): string[] {
  const paths = [
    // Deployed with the Lambda layer
    path.join('/opt', TAXONOMY_FILE),
    // Local runs from the project root
    path.join(process.cwd(), TAXONOMY_FILE),
  ];

  const configured = loadConfig().taxonomyPath;
  return configured ? [configured, ...paths] : paths;
}

function loadTaxonomyFromFile(): TaxonomyFile {
  const possiblePaths = candidatePaths();

  for (const filePath of possiblePaths) {
    if (!fs.existsSync(filePath)) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ValidationError(`Taxonomy file at ${filePath} is not valid JSON: ${String(error)}`);
    }

    const parsed = TaxonomyFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Invalid taxonomy file at ${filePath}: ${parsed.error.message}`);
    }

    logger.info('Taxonomy loaded', {
      version: parsed.data.metadata.version,
      file_path: filePath,
      attributes: Object.keys(parsed.data.attributes),
    });
    return parsed.data;
  }

  throw new ValidationError(`Taxonomy file not found. Searched paths: ${possiblePaths.join(', ')}`);
}

export function getTaxonomy(): TaxonomyFile {
  if (cachedTaxonomy === null) {
    cachedTaxonomy = loadTaxonomyFromFile();
  }
  return cachedTaxonomy;
}

export function getCategoryHierarchy(): RawHierarchy {
  return getTaxonomy().categories;
}

/** Attribute name (e.g. "color") to its hierarchy, in file order */
export function getAttributeHierarchies(): Record<string, RawHierarchy> {
  return getTaxonomy().attributes;
}

export function clearCache(): void {
  cachedTaxonomy = null;
}
