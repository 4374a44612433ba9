/* src/runner/registry/index.ts
 * Script Registry: the declared, immutable set of executable scripts.
 */
import { accessSync, constants, statSync } from 'node:fs';
import path from 'node:path';

import { ConfigError, NotFoundError } from '@/runner/errors';

export type ScriptMode = 'discrete' | 'streaming';

export type ScriptFunction = {
  name: string;
  /** Display label for the triggering control. */
  display: string;
};

export type ScriptDescriptor = Readonly<{
  name: string;
  /** Absolute path to the script file. */
  path: string;
  mode: ScriptMode;
  functions: readonly Readonly<ScriptFunction>[];
}>;

/** Descriptor input as declared in config (path may be relative). */
export type ScriptDeclaration = {
  name: string;
  path: string;
  mode: ScriptMode;
  functions?: ScriptFunction[];
};

/** Only discrete scripts can dispatch a named function per invocation. */
const supportsFunctions = (mode: ScriptMode): boolean => mode === 'discrete';

const readableFile = (abs: string): string | undefined => {
  try {
    if (!statSync(abs).isFile()) return 'not a regular file';
    accessSync(abs, constants.R_OK);
    return undefined;
  } catch (e) {
    const code = e instanceof Error && 'code' in e ? String(e.code) : String(e);
    return code === 'ENOENT' ? 'file not found' : `not readable (${code})`;
  }
};

/** Result key of a script (or one of its functions) in the app state. */
export const resultKey = (script: string, fn?: string): string =>
  fn ? `${script}.${fn}` : script;

export class ScriptRegistry {
  private readonly byName: ReadonlyMap<string, ScriptDescriptor>;

  private constructor(private readonly ordered: readonly ScriptDescriptor[]) {
    this.byName = new Map(ordered.map((d) => [d.name, d]));
  }

  /**
   * Validate declarations and build the registry.
   *
   * @param declarations - Scripts in declaration order.
   * @param opts - `baseDir` resolves relative paths (defaults to cwd).
   * @throws ConfigError listing every problem found.
   */
  static load(
    declarations: readonly ScriptDeclaration[],
    opts?: { baseDir?: string },
  ): ScriptRegistry {
    const baseDir = opts?.baseDir ?? process.cwd();
    const issues: string[] = [];
    const seen = new Set<string>();
    const out: ScriptDescriptor[] = [];

    declarations.forEach((d, i) => {
      const where = `scripts[${i}] (${d.name})`;
      if (seen.has(d.name)) issues.push(`${where}: duplicate script name`);
      if (d.name.includes('.')) issues.push(`${where}: script name must not contain "."`);
      seen.add(d.name);

      const fns = d.functions ?? [];
      if (fns.length > 0 && !supportsFunctions(d.mode)) {
        issues.push(`${where}: functions are not supported for ${d.mode} scripts`);
      }
      const fnNames = new Set<string>();
      for (const f of fns) {
        if (fnNames.has(f.name))
          issues.push(`${where}: duplicate function name "${f.name}"`);
        fnNames.add(f.name);
      }

      const abs = path.resolve(baseDir, d.path);
      const problem = readableFile(abs);
      if (problem) issues.push(`${where}: ${d.path}: ${problem}`);

      out.push(
        Object.freeze({
          name: d.name,
          path: abs,
          mode: d.mode,
          functions: Object.freeze(fns.map((f) => Object.freeze({ ...f }))),
        }),
      );
    });

    if (issues.length > 0) throw new ConfigError('invalid scripts', issues);
    return new ScriptRegistry(Object.freeze(out));
  }

  public lookup(name: string): ScriptDescriptor {
    const d = this.byName.get(name);
    if (!d) throw new NotFoundError('script', name);
    return d;
  }

  public has(name: string): boolean {
    return this.byName.has(name);
  }

  /** All descriptors in declaration order. */
  public list(): readonly ScriptDescriptor[] {
    return this.ordered;
  }

  public discrete(): ScriptDescriptor[] {
    return this.ordered.filter((d) => d.mode === 'discrete');
  }

  public streaming(): ScriptDescriptor[] {
    return this.ordered.filter((d) => d.mode === 'streaming');
  }
}
