// src/common/interop/resolve.ts
/**
 * Resolve a function export from a dynamically imported module, preferring a
 * named export, then an identically named property on the default export,
 * then a default export that is itself callable.
 */
export type ModuleFunction = (...args: unknown[]) => unknown;

const isFunction = (v: unknown): v is ModuleFunction => typeof v === 'function';

const prop = (holder: unknown, key: string): unknown =>
  holder !== null &&
  (typeof holder === 'object' || typeof holder === 'function')
    ? Reflect.get(holder, key)
    : undefined;

/**
 * @param mod - The imported module namespace (shape unknown).
 * @param name - Export name to look for.
 * @param label - Used in the error message (e.g. the module specifier).
 * @throws When no callable export is found.
 */
export function resolveNamedOrDefaultFunction(
  mod: unknown,
  name: string,
  label?: string,
): ModuleFunction {
  const named = prop(mod, name);
  if (isFunction(named)) return named;
  const def = prop(mod, 'default');
  const viaDefault = prop(def, name);
  if (isFunction(viaDefault)) return viaDefault;
  if (isFunction(def)) return def;
  const what = label && label.trim().length ? label.trim() : 'module';
  throw new Error(`${what}: export "${name}" not found`);
}
