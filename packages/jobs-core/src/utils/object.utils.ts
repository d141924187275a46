/**
 * True for `{}` literals and `Object.create(null)` values, false for class instances
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Human-readable type name for error messages
 */
export function describeValueType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'Array';
  if (typeof value === 'function') return value.name ? `function ${value.name}` : 'function';
  if (typeof value !== 'object') return typeof value;

  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== 'object' || proto === null) return 'Object';
  const ctor: unknown = Reflect.get(proto, 'constructor');
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}
