/**
 * Ordered list of directories the module loader resolves entries against.
 * One instance is shared by the whole process; mutate it only through a
 * {@link ScopeGuard}.
 */
export class ModuleSearchScope {
  private dirs: string[];

  constructor(initial: readonly string[] = []) {
    this.dirs = [...initial];
  }

  entries(): readonly string[] {
    return [...this.dirs];
  }

  has(dir: string): boolean {
    return this.dirs.includes(dir);
  }

  get size(): number {
    return this.dirs.length;
  }

  acquire(): ScopeGuard {
    return new ScopeGuard(this);
  }

  /** @internal */
  prepend(dir: string): void {
    this.dirs.unshift(dir);
  }

  /** @internal */
  removeFirst(dir: string): void {
    const index = this.dirs.indexOf(dir);
    if (index >= 0) this.dirs.splice(index, 1);
  }
}

/**
 * Records the entries it pushes and removes exactly those on release.
 * Release is idempotent; pushing after release throws.
 */
export class ScopeGuard {
  private readonly pushed: string[] = [];
  private released = false;

  constructor(private readonly scope: ModuleSearchScope) {}

  push(dir: string): void {
    if (this.released) throw new Error("Scope guard already released");
    this.scope.prepend(dir);
    this.pushed.push(dir);
  }

  pushIfAbsent(dir: string): void {
    if (!this.scope.has(dir)) this.push(dir);
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    for (const dir of [...this.pushed].reverse()) {
      this.scope.removeFirst(dir);
    }
  }
}

export const moduleSearchScope = new ModuleSearchScope();
