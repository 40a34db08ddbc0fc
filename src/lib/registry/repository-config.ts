import fs from 'fs/promises';
import type { ImageReference } from '../../types';
import { config } from '../config';
import { errorMessage } from '../errors';
import { looksLikeRegistry, parseImageReference, parseRepository } from './image-reference';

export type RepositoryEntry =
  | { kind: 'repository'; line: number; registry: string; repository: string }
  | { kind: 'image'; line: number; reference: ImageReference };

export interface RepositoryConfig {
  entries: RepositoryEntry[];
  errors: { line: number; text: string; message: string }[];
}

/**
 * Parse a repository list: one entry per line, `#` starts a comment.
 * An entry is a bare repository path (`library/python`), a qualified
 * repository (`mcr.microsoft.com/azurelinux/base/python`) or a qualified
 * image with a tag (`mcr.microsoft.com/azurelinux/base/python:3.12`).
 */
export function parseRepositoryConfig(text: string, defaultRegistry: string = config.defaultRegistry): RepositoryConfig {
  const entries: RepositoryEntry[] = [];
  const errors: RepositoryConfig['errors'] = [];

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = index + 1;
    const hash = rawLine.indexOf('#');
    const entry = (hash >= 0 ? rawLine.slice(0, hash) : rawLine).trim();
    if (!entry) return;

    try {
      const firstSegment = entry.split('/')[0];
      const lastSegment = entry.slice(entry.lastIndexOf('/') + 1);
      const hasTag = looksLikeRegistry(firstSegment) && entry.includes('/') && lastSegment.includes(':');

      if (hasTag) {
        entries.push({ kind: 'image', line, reference: parseImageReference(entry, defaultRegistry) });
      } else {
        entries.push({ kind: 'repository', line, ...parseRepository(entry, defaultRegistry) });
      }
    } catch (error) {
      errors.push({ line, text: entry, message: errorMessage(error) });
    }
  });

  return { entries, errors };
}

export async function loadRepositoryConfig(filePath: string, defaultRegistry?: string): Promise<RepositoryConfig> {
  const text = await fs.readFile(filePath, 'utf8');
  return parseRepositoryConfig(text, defaultRegistry);
}
