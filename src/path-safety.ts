import { UnsafePathError } from './errors.js';

/**
 * Characters a shell would interpret. Paths handed to external tools must
 * not contain any of them, even though the tools are spawned without a shell.
 */
export const SHELL_METACHARACTERS: readonly string[] = [';', '|', '&', '$', '`', '\n', '\r', '>', '<', '(', ')', '{', '}'];

export function assertSafePath(path: string, label: string): void {
  for (const character of SHELL_METACHARACTERS) {
    if (path.includes(character)) {
      throw new UnsafePathError(label, character);
    }
  }
}
