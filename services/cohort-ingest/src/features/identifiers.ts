export function stripVersion(id: string): string {
  const trimmed = id.trim();
  const dot = trimmed.indexOf('.');
  return dot === -1 ? trimmed : trimmed.slice(0, dot);
}
