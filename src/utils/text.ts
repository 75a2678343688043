/** Counts code points, so characters outside the BMP count once. */
export function countCharacters(value: string): number {
  return Array.from(value).length;
}

export function previewText(value: string, maxLength = 50): string {
  const normalized = value.replace(/\s+/g, ' ').trim();

  if (normalized.length > maxLength) {
    return `${normalized.slice(0, maxLength)}...`;
  }

  return normalized;
}

export function sanitizeErrorMessage(message: string): string {
  const normalized = message.replace(/\s+/g, ' ').trim();

  if (normalized.length > 180) {
    return `${normalized.slice(0, 177)}...`;
  }

  return normalized;
}
