import * as path from 'path';
import type { BookMetadata, JsonObject, MetadataResolver, ResolveRequest } from '../types.js';
import { isJsonObject, normalizeMetadata } from '../normalize.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { readTextIfExists } from '../../utils/fs-utils.js';

/** "Author - Title" folder naming */
const FOLDER_NAME_PATTERN = /^(.+?)\s+-\s+(.+)$/;

/**
 * Resolves metadata from files already present in the folder, without a model.
 *
 * Sources, first match wins:
 * 1. metadata.json (its own confidence, "high" when absent)
 * 2. author.txt / title.txt / reader.txt ("high" when author and title are both present)
 * 3. the folder name as "Author - Title" ("low")
 */
export class LocalResolver implements MetadataResolver {
  readonly name = 'local';

  async resolve(request: ResolveRequest): Promise<BookMetadata | null> {
    const { record } = request;

    try {
      const fromJson = normalizeMetadata(await this.fromMetadataJson(record.fullPath));
      if (fromJson) {
        logger.debug(`Using metadata.json for: ${record.relativePath}`);
        return fromJson;
      }

      const fromSidecars = normalizeMetadata(await this.fromSidecarTexts(record.fullPath));
      if (fromSidecars) {
        logger.debug(`Using sidecar text files for: ${record.relativePath}`);
        return fromSidecars;
      }
    } catch (error) {
      logger.warn(`Cannot read local metadata for ${record.relativePath}: ${errorMessage(error)}`);
      return null;
    }

    return normalizeMetadata(this.fromFolderName(record.folderName));
  }

  private async fromMetadataJson(folder: string): Promise<JsonObject | null> {
    const content = await readTextIfExists(path.join(folder, 'metadata.json'));
    if (content === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      logger.warn(`Ignoring unparseable metadata.json in: ${folder}`);
      return null;
    }
    if (!isJsonObject(parsed)) {
      return null;
    }

    return isJsonObject(parsed.confidence) ? parsed : { ...parsed, confidence: { title: 'high' } };
  }

  private async fromSidecarTexts(folder: string): Promise<JsonObject | null> {
    const [author, title, narrator] = await Promise.all(
      ['author.txt', 'title.txt', 'reader.txt'].map(async name =>
        (await readTextIfExists(path.join(folder, name)))?.trim() ?? ''
      )
    );

    if (!author && !title) {
      return null;
    }

    const document: JsonObject = {
      confidence: { title: author && title ? 'high' : 'low' },
    };
    if (author) document.author = author;
    if (title) document.title = title;
    if (narrator) document.narrator = narrator;
    return document;
  }

  private fromFolderName(folderName: string): JsonObject {
    const match = FOLDER_NAME_PATTERN.exec(folderName);
    if (match) {
      return { author: match[1], title: match[2], confidence: { title: 'low' } };
    }
    return { title: folderName, confidence: { title: 'low' } };
  }
}
