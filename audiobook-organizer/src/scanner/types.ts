/**
 * A folder that directly contains at least one audio file
 */
export interface ScanRecord {
  /** Path relative to the scan root, always joined with "/"; the tracker key */
  relativePath: string;
  /** Absolute path of the folder */
  fullPath: string;
  /** Name of the folder itself */
  folderName: string;
  /** Name of the folder's parent, or "" for folders directly under the root */
  parentName: string;
  /** All entry names in the folder, sorted */
  files: string[];
  /** Regular files in `files` recognized as audio */
  audioFiles: string[];
}

export interface ScanOptions {
  /** Regex patterns for entry names to leave out of listings and recursion */
  ignoreFilePatterns?: string[];
}
