/**
 * Centralized Path Configuration
 * Single source of truth for the directories the notes pipeline reads and writes
 */

import { resolve, normalize, relative, isAbsolute, join } from 'path';

/**
 * Path configuration with environment variable overrides
 */
export const PATHS = {
  ROOT_DIR: process.cwd(),

  // Prompt templates shipped with the engine
  TEMPLATES_DIR: process.env.TEMPLATES_DIR || 'content-engine/prompts/templates',

  // Generated artifacts
  OUTPUT_DIR: process.env.OUTPUT_DIR || 'output',
  SNAPSHOTS_DIR: process.env.SNAPSHOTS_DIR || 'output/snapshots',
  DOCUMENTS_DIR: process.env.DOCUMENTS_DIR || 'output/documents'
} as const;

export type PathKey = keyof typeof PATHS;

/**
 * Resolve path relative to project root
 */
export function resolvePath(...segments: string[]): string {
  return resolve(PATHS.ROOT_DIR, ...segments);
}

/**
 * Absolute path of a configured directory
 */
export function resolveConfiguredPath(key: PathKey, ...segments: string[]): string {
  if (key === 'ROOT_DIR') {
    return join(PATHS.ROOT_DIR, ...segments);
  }
  return resolvePath(PATHS[key], ...segments);
}

/**
 * Validation utilities for paths
 */
export const pathValidation = {
  /**
   * Check if path is within allowed directory
   */
  isWithinDirectory: (filePath: string, allowedDir: string): boolean => {
    const relativePath = relative(normalize(allowedDir), normalize(filePath));
    return !relativePath.startsWith('..') && !isAbsolute(relativePath);
  },

  /**
   * Sanitize filename for safe file system usage
   */
  sanitizeFilename: (filename: string): string => {
    return filename
      .replace(/[<>:"/\\|?*]/g, '_')
      .replace(/[\x00-\x1f\x7f]/g, '')
      .replace(/^\.+/, '')
      .substring(0, 255);
  }
};

/**
 * Absolute path of a file inside a configured directory. Throws when the name
 * would resolve outside it.
 */
export function resolveOutputFile(key: Exclude<PathKey, 'ROOT_DIR'>, fileName: string): string {
  const directory = resolveConfiguredPath(key);
  const filePath = resolve(directory, fileName);
  if (filePath === directory || !pathValidation.isWithinDirectory(filePath, directory)) {
    throw new Error(`Refusing to write ${fileName} outside ${directory}`);
  }
  return filePath;
}

/**
 * Configuration validation
 */
export function validatePathConfiguration(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const [key, pathValue] of Object.entries(PATHS)) {
    if (key !== 'ROOT_DIR' && isAbsolute(pathValue)) {
      errors.push(`Path ${key} should be relative, got: ${pathValue}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
