const SAFE_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function normalizeDeviceName(value: string | null | undefined): string {
  return typeof value === 'string' ? value.trim() : '';
}

/** Device names double as directory names under the output root. */
export function isSafeDeviceName(value: string): boolean {
  return SAFE_NAME.test(value) && value !== '.' && value !== '..';
}

export function canonicalDeviceName(value: string | null | undefined): string {
  return normalizeDeviceName(value).toLowerCase();
}
