import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";

export interface FileMatch {
  name: string;
  path: string;
}

export interface FileLocatorOptions {
  roots: string[];
  maxDepth?: number;
  maxEntries?: number;
}

const EXCLUDED_DIRS = new Set([".git", ".venv", "node_modules", "__pycache__", ".cache", ".Trash", "Library"]);

const LISTED_MATCHES = 5;

/**
 * Breadth-first name search over a few roots. Bounded by depth and by the number of
 * directory entries looked at, so a huge home directory cannot stall a request.
 */
export class FileLocator {
  private readonly roots: string[];
  private readonly maxDepth: number;
  private readonly maxEntries: number;

  constructor(options: FileLocatorOptions) {
    this.roots = [...options.roots];
    this.maxDepth = options.maxDepth ?? 6;
    this.maxEntries = options.maxEntries ?? 20_000;
  }

  async search(query: string, limit = 10): Promise<FileMatch[]> {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return [];
    }

    const matches: FileMatch[] = [];
    const queue: Array<{ dir: string; depth: number }> = this.roots.map((dir) => ({ dir, depth: 0 }));
    let seen = 0;

    while (queue.length > 0 && matches.length < limit && seen < this.maxEntries) {
      const next = queue.shift();
      if (!next) {
        break;
      }

      // Unreadable directories are skipped.
      const entries = await readdir(next.dir, { withFileTypes: true }).catch((): Dirent[] => []);

      entries.sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of entries) {
        seen += 1;
        if (seen > this.maxEntries || matches.length >= limit) {
          break;
        }

        const path = join(next.dir, entry.name);
        if (entry.isDirectory()) {
          if (!EXCLUDED_DIRS.has(entry.name) && !entry.name.startsWith(".") && next.depth < this.maxDepth) {
            queue.push({ dir: path, depth: next.depth + 1 });
          }
          continue;
        }

        if (entry.isFile() && entry.name.toLowerCase().includes(needle)) {
          matches.push({ name: entry.name, path });
        }
      }
    }

    return matches;
  }
}

export const describeFileMatches = (query: string, matches: FileMatch[]): string => {
  if (matches.length === 0) {
    return `No files found matching '${query}'.`;
  }

  const lines = [`Found ${matches.length} file(s) matching '${query}':`];
  matches.slice(0, LISTED_MATCHES).forEach((match, index) => {
    lines.push(`  ${index + 1}. ${match.name} (${match.path})`);
  });
  if (matches.length > LISTED_MATCHES) {
    lines.push(`  ... and ${matches.length - LISTED_MATCHES} more`);
  }
  return lines.join("\n");
};
