export function isTruthy(value: string | undefined): boolean {
  const v = (value ?? '').toLowerCase().trim();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function isTruthyEnv(name: string): boolean {
  return isTruthy(process.env[name]);
}
