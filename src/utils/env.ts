// Environment access that also works where `process` is absent (browser host)
export function getEnv(name: string): string | undefined {
  if (typeof process === 'undefined' || !process.env) return undefined;
  const v = process.env[name];
  return v && v.length > 0 ? v : undefined;
}

export function envFlag(name: string): boolean {
  return getEnv(name) === '1';
}

export const hex = (v: number, width: number): string => (v >>> 0).toString(16).padStart(width, '0');
