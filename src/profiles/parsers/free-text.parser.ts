export function extractFreeText(text: string): string | null {
  const normalized = text.trim();
  return normalized.length > 0 ? normalized : null;
}
