/**
 * Scoped working-directory change.
 */

/**
 * Run `fn` with `dir` as the process working directory.
 *
 * The previous directory is restored when `fn` settles, whether it
 * resolves or throws.
 */
export async function withWorkingDirectory<T>(dir: string, fn: () => Promise<T>): Promise<T> {
  const previous = process.cwd();
  process.chdir(dir);
  try {
    return await fn();
  } finally {
    process.chdir(previous);
  }
}
