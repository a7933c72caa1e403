export function formatJsonReport(result: unknown): string {
  return JSON.stringify(result, null, 2);
}
