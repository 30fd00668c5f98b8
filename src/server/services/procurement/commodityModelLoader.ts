/**
 * Loads the trained commodity-group artifacts once at startup.
 * Missing or inconsistent artifacts are fatal: the server must not start without them.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ModelArtifactError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { CommodityClassifier, type CommodityModel } from './CommodityClassifier.js';

export const VECTORIZER_FILE = 'vectorizer.json';
export const CLASSIFIER_FILE = 'classifier.json';

export { ModelArtifactError };

const vectorizerSchema = z.object({
  version: z.string().min(1),
  ngramRange: z.tuple([z.number().int().min(1), z.number().int().min(1)]),
  sublinearTf: z.boolean(),
  norm: z.enum(['l2', 'none']),
  vocabulary: z.record(z.string(), z.number().int().nonnegative()),
  idf: z.array(z.number().finite()),
});

const classifierSchema = z.object({
  version: z.string().min(1),
  vectorizerVersion: z.string().min(1),
  classes: z.array(z.string().min(1)).min(1),
  intercept: z.array(z.number().finite()),
  coef: z.array(z.record(z.string().regex(/^\d+$/), z.number().finite())),
});

/**
 * Cross-artifact checks zod cannot express: dimensions and version pairing
 */
export function checkModelConsistency(model: CommodityModel): string[] {
  const problems: string[] = [];
  const { vectorizer, classifier } = model;
  const featureCount = vectorizer.idf.length;

  if (vectorizer.ngramRange[0] > vectorizer.ngramRange[1]) {
    problems.push(`ngramRange [${vectorizer.ngramRange.join(', ')}] is inverted`);
  }
  for (const [term, index] of Object.entries(vectorizer.vocabulary)) {
    if (index >= featureCount) {
      problems.push(`vocabulary term "${term}" points at feature ${index} but idf has ${featureCount} entries`);
    }
  }
  if (classifier.vectorizerVersion !== vectorizer.version) {
    problems.push(
      `classifier was trained on vectorizer ${classifier.vectorizerVersion}, found ${vectorizer.version}`
    );
  }
  if (classifier.intercept.length !== classifier.classes.length) {
    problems.push(`intercept has ${classifier.intercept.length} entries for ${classifier.classes.length} classes`);
  }
  if (classifier.coef.length !== classifier.classes.length) {
    problems.push(`coef has ${classifier.coef.length} rows for ${classifier.classes.length} classes`);
  }
  if (new Set(classifier.classes).size !== classifier.classes.length) {
    problems.push('classes contain duplicates');
  }
  classifier.coef.forEach((row, classIndex) => {
    for (const feature of Object.keys(row)) {
      if (Number(feature) >= featureCount) {
        problems.push(`coef row ${classIndex} references feature ${feature} outside the vocabulary`);
      }
    }
  });

  return problems;
}

async function readArtifact<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf8');
  } catch (error) {
    throw new ModelArtifactError(`Model artifact ${file} could not be read`, {
      file,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ModelArtifactError(`Model artifact ${file} is not valid JSON`, {
      file,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ModelArtifactError(`Model artifact ${file} has an unexpected shape`, {
      file,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

/**
 * Read, validate and freeze both artifacts from `directory` (relative paths resolve from the working directory)
 */
export async function loadCommodityClassifier(directory: string): Promise<CommodityClassifier> {
  const root = path.resolve(directory);
  const [vectorizer, classifier] = await Promise.all([
    readArtifact(path.join(root, VECTORIZER_FILE), vectorizerSchema),
    readArtifact(path.join(root, CLASSIFIER_FILE), classifierSchema),
  ]);

  const model: CommodityModel = { vectorizer, classifier };
  const problems = checkModelConsistency(model);
  if (problems.length > 0) {
    throw new ModelArtifactError('Commodity model artifacts are inconsistent', { directory: root, problems });
  }

  logger.info(
    {
      directory: root,
      vectorizerVersion: vectorizer.version,
      classifierVersion: classifier.version,
      classes: classifier.classes.length,
      features: vectorizer.idf.length,
    },
    'Commodity group classifier loaded'
  );

  return new CommodityClassifier(Object.freeze(model));
}
