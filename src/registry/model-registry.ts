import { mkdir, readdir, readFile, rename, rm, writeFile, stat } from "fs/promises";
import { join } from "path";

import { restoreClassifier, restoreVectorizer } from "../classifier/index.js";
import { ArtifactError, NotFoundError, ValidationError, VersionConflictError } from "../lib/errors.js";
import { isNotFound, readJsonFile, writeFileAtomic } from "../lib/files.js";
import { LabelSchemaSchema } from "../lib/labels.js";
import { logger } from "../lib/logger.js";
import { ok, err } from "../lib/result.js";

import type { Dirent } from "fs";

import type { TextClassifier, TextVectorizer } from "../classifier/index.js";
import type { Result } from "../lib/result.js";

/**
 * Label schema used by versions registered without one
 */
export const DEFAULT_LABEL_SCHEMA: readonly string[] = ["World", "Sports", "Business", "Sci/Tech"];

const POINTER_FILE = "current_version";
const CLASSIFIER_FILE = "classifier.json";
const VECTORIZER_FILE = "vectorizer.json";
const LABELS_FILE = "labels.json";
const VERSION_DIR_PATTERN = /^v([1-9]\d*)$/;

/**
 * A version's artifacts, ready for prediction
 */
export interface LoadedModel {
  versionId: number;
  classifier: TextClassifier;
  vectorizer: TextVectorizer;
  labelSchema: string[];
}

const log = logger.child("[registry]");

/**
 * On-disk catalogue of model versions with a single current-version pointer.
 *
 * Layout under the models directory:
 * - `v<N>/classifier.json`, `v<N>/vectorizer.json`, `v<N>/labels.json`
 * - `current_version` holding the promoted id
 *
 * A version directory only ever appears whole: artifacts are written into a
 * staging directory that is renamed into place.
 */
export class ModelRegistry {
  constructor(private readonly modelsDir: string) {}

  /**
   * The promoted version, or the highest registered one when no pointer exists
   */
  async resolveCurrentVersion(): Promise<Result<number, NotFoundError>> {
    const pointer = await this.readPointer();
    if (pointer !== undefined) {
      return ok(pointer);
    }

    const versions = await this.listVersions();
    const latest = versions[versions.length - 1];
    if (latest === undefined) {
      return err(new NotFoundError("No model version registered", "version"));
    }

    log.warn(`No current version pointer; falling back to highest registered version v${latest}`);
    return ok(latest);
  }

  /**
   * Registered version ids, ascending
   */
  async listVersions(): Promise<number[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.modelsDir, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const versions: number[] = [];
    for (const entry of entries) {
      const match = VERSION_DIR_PATTERN.exec(entry.name);
      if (entry.isDirectory() && match?.[1] !== undefined) {
        versions.push(Number(match[1]));
      }
    }
    return versions.sort((a, b) => a - b);
  }

  /**
   * Check whether a version directory exists
   */
  async has(versionId: number): Promise<boolean> {
    try {
      const info = await stat(this.versionDir(versionId));
      return info.isDirectory();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  /**
   * Load a version's classifier, vectorizer and label schema.
   * Missing artifacts are NotFound; unreadable ones throw ArtifactError.
   */
  async load(versionId: number): Promise<Result<LoadedModel, NotFoundError>> {
    const dir = this.versionDir(versionId);

    const rawClassifier = await this.readArtifact(join(dir, CLASSIFIER_FILE), "classifier", versionId);
    if (rawClassifier === undefined) {
      return err(new NotFoundError(`Classifier for model v${versionId} not found`, "classifier", versionId));
    }
    const rawVectorizer = await this.readArtifact(join(dir, VECTORIZER_FILE), "vectorizer", versionId);
    if (rawVectorizer === undefined) {
      return err(new NotFoundError(`Vectorizer for model v${versionId} not found`, "vectorizer", versionId));
    }

    const classifier = restoreClassifier(rawClassifier, versionId);
    const vectorizer = restoreVectorizer(rawVectorizer, versionId);
    const labelSchema = await this.labelSchemaFor(versionId);

    if (classifier.classCount !== labelSchema.length) {
      throw new ArtifactError(
        `Model v${versionId} predicts ${classifier.classCount} classes but its label schema has ${labelSchema.length}`,
        { artifact: "labels", versionId }
      );
    }

    log.debug(`Loaded model v${versionId} from ${dir}`);
    return ok({ versionId, classifier, vectorizer, labelSchema });
  }

  /**
   * Load only the vectorizer of a version, if it has one
   */
  async loadVectorizer(versionId: number): Promise<TextVectorizer | undefined> {
    const raw = await this.readArtifact(join(this.versionDir(versionId), VECTORIZER_FILE), "vectorizer", versionId);
    return raw === undefined ? undefined : restoreVectorizer(raw, versionId);
  }

  /**
   * A version's label schema, or the default schema when none was stored
   */
  async labelSchemaFor(versionId: number): Promise<string[]> {
    const raw = await this.readArtifact(join(this.versionDir(versionId), LABELS_FILE), "labels", versionId);
    if (raw === undefined) {
      return [...DEFAULT_LABEL_SCHEMA];
    }
    const parsed = LabelSchemaSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ArtifactError(`Invalid label schema for model v${versionId}`, {
        artifact: "labels",
        versionId,
        issues: parsed.error.issues,
      });
    }
    return parsed.data;
  }

  /**
   * Persist artifacts for a new version. Never overwrites an existing one.
   */
  async register(
    versionId: number,
    classifier: TextClassifier,
    vectorizer: TextVectorizer,
    labelSchema: readonly string[]
  ): Promise<Result<void, VersionConflictError>> {
    if (!Number.isInteger(versionId) || versionId < 1) {
      throw new ValidationError(`Version id must be a positive integer, got ${versionId}`);
    }
    const labels = LabelSchemaSchema.safeParse(labelSchema);
    if (!labels.success) {
      throw new ValidationError(labels.error.issues[0]?.message ?? "Invalid label schema", { versionId });
    }
    if (classifier.classCount !== labelSchema.length) {
      throw new ValidationError(
        `Classifier has ${classifier.classCount} classes but label schema has ${labelSchema.length}`,
        { versionId }
      );
    }
    if (await this.has(versionId)) {
      return err(new VersionConflictError(versionId));
    }

    await mkdir(this.modelsDir, { recursive: true });
    const staging = join(this.modelsDir, `.staging-v${versionId}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(staging);

    try {
      await writeFile(join(staging, CLASSIFIER_FILE), JSON.stringify(classifier.toJSON()), "utf-8");
      await writeFile(join(staging, VECTORIZER_FILE), JSON.stringify(vectorizer.toJSON()), "utf-8");
      await writeFile(join(staging, LABELS_FILE), JSON.stringify(labelSchema, null, 2), "utf-8");
      await rename(staging, this.versionDir(versionId));
    } catch (error) {
      await rm(staging, { recursive: true, force: true });
      // Another writer registered the same id between the check and the rename
      if (error instanceof Error && "code" in error && (error.code === "ENOTEMPTY" || error.code === "EEXIST")) {
        return err(new VersionConflictError(versionId));
      }
      throw error;
    }

    log.info(`Registered model v${versionId}`);
    return ok(undefined);
  }

  /**
   * Atomically point the current version at a registered version
   */
  async promote(versionId: number): Promise<Result<void, NotFoundError>> {
    if (!(await this.has(versionId))) {
      return err(new NotFoundError(`Model v${versionId} is not registered`, "version", versionId));
    }
    await writeFileAtomic(join(this.modelsDir, POINTER_FILE), `${versionId}\n`);
    log.info(`Promoted model v${versionId} to current`);
    return ok(undefined);
  }

  /**
   * Remove a version that was registered but never promoted. The directory
   * is renamed out of the version namespace before it is deleted, so a
   * half-deleted version is never listed.
   */
  async discard(versionId: number): Promise<Result<void, NotFoundError | VersionConflictError>> {
    if (!(await this.has(versionId))) {
      return err(new NotFoundError(`Model v${versionId} is not registered`, "version", versionId));
    }
    if ((await this.readPointer()) === versionId) {
      return err(new VersionConflictError(versionId, `Model v${versionId} is current and cannot be discarded`));
    }

    const trash = join(this.modelsDir, `.discard-v${versionId}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await rename(this.versionDir(versionId), trash);
    await rm(trash, { recursive: true, force: true });
    log.warn(`Discarded model v${versionId}`);
    return ok(undefined);
  }

  private versionDir(versionId: number): string {
    return join(this.modelsDir, `v${versionId}`);
  }

  private async readPointer(): Promise<number | undefined> {
    let raw: string;
    try {
      raw = await readFile(join(this.modelsDir, POINTER_FILE), "utf-8");
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }

    const versionId = Number(raw.trim());
    if (!Number.isInteger(versionId) || versionId < 1) {
      throw new ArtifactError("Current version pointer is corrupt", { artifact: "pointer" });
    }
    return versionId;
  }

  private async readArtifact(path: string, artifact: string, versionId: number): Promise<unknown> {
    try {
      return await readJsonFile(path);
    } catch (error) {
      log.debug(`Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`);
      throw new ArtifactError(`Could not read ${artifact} artifact for model v${versionId}`, {
        artifact,
        versionId,
      });
    }
  }
}

/**
 * Create a registry rooted at a models directory
 */
export function createModelRegistry(modelsDir: string): ModelRegistry {
  return new ModelRegistry(modelsDir);
}
