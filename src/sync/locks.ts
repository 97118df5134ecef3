import path from "node:path";

/**
 * At most one in-flight sync per repository path. Shared between
 * orchestrators that work on the same repositories.
 */
export class RepositoryLocks {
  private readonly held = new Set<string>();

  /**
   * Returns a release function, or null when the repository is busy.
   */
  tryAcquire(repoPath: string): (() => void) | null {
    const key = path.resolve(repoPath);
    if (this.held.has(key)) {
      return null;
    }
    this.held.add(key);
    let released = false;
    return () => {
      if (!released) {
        released = true;
        this.held.delete(key);
      }
    };
  }

  isLocked(repoPath: string): boolean {
    return this.held.has(path.resolve(repoPath));
  }
}

export const defaultRepositoryLocks = new RepositoryLocks();
