import { readFile } from 'node:fs/promises';

// `htpasswd -B` writes $2y$, which is the same algorithm as $2b$
function normalizeHash(hash: string): string {
  return hash.startsWith('$2y$') ? `$2b$${hash.slice(4)}` : hash;
}

/**
 * Flat credential file in htpasswd layout: one `user:hash` pair per line.
 * Blank lines and lines starting with `#` are ignored.
 */
export class Htpasswd {
  private readonly entries = new Map<string, string>();

  static async load(fileName: string): Promise<Htpasswd> {
    const htpasswd = new Htpasswd();
    htpasswd.parse(await readFile(fileName, 'utf8'));
    return htpasswd;
  }

  parse(contents: string) {
    for (const rawLine of contents.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#')) continue;

      const separator = line.indexOf(':');
      if (separator <= 0) {
        throw new Error(`malformed htpasswd line: ${line}`);
      }
      this.entries.set(
        line.slice(0, separator),
        normalizeHash(line.slice(separator + 1))
      );
    }
  }

  get(user: string): string | undefined {
    return this.entries.get(user);
  }

  get size(): number {
    return this.entries.size;
  }
}
