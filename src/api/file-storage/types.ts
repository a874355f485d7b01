/**
 * File storage types.
 *
 * All property names use snake_case to match the project-wide convention.
 */

/**
 * File storage interface for recipe images.
 */
export interface FileStorage {
  upload(key: string, data: Buffer, content_type: string): Promise<string>;
  delete(key: string): Promise<void>;
  /** URL the stored object is served from */
  publicUrl(key: string): string;
  /** Whether new objects can currently be written (used by the health check) */
  isWritable(): Promise<boolean>;
}

/**
 * Configuration for filesystem storage
 */
export interface LocalStorageConfig {
  /** Absolute directory objects are written under */
  root: string;
  /** URL path prefix the directory is served at, e.g. `/static/media/` */
  url_prefix: string;
  /** Prepended to `url_prefix` to build absolute URLs; empty keeps them relative */
  base_url?: string;
}

/** A content-sniffed image type */
export interface DetectedImage {
  ext: string;
  mime: string;
}

/**
 * Default upload size limit (10MB)
 */
export const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;
