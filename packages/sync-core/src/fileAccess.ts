/**
 * Grants temporary access to a file outside the app's own storage, such as a
 * user-picked location on a sandboxed platform.
 */
export interface FileAccessProvider {
  startAccess(filePath: string): boolean | Promise<boolean>;
  stopAccess(filePath: string): void | Promise<void>;
}

/**
 * Provider for hosts where every path is already accessible.
 */
export class OpenFileAccess implements FileAccessProvider {
  startAccess(): boolean {
    return true;
  }

  stopAccess(): void {
    // Nothing to release.
  }
}

/**
 * Runs `task` inside a start/stop access pair. Access is released exactly
 * once on every exit path, and only if starting it succeeded.
 */
export async function withFileAccess<T>(
  provider: FileAccessProvider,
  filePath: string,
  task: () => Promise<T>,
): Promise<T> {
  const started = await provider.startAccess(filePath);
  try {
    return await task();
  } finally {
    if (started) {
      await provider.stopAccess(filePath);
    }
  }
}
