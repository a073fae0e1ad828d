/**
 * Collapses runs of whitespace and, when maxLength is given, truncates with
 * a trailing "..." so the result fits.
 */
export function formatGradeDescription(description: string, maxLength?: number): string {
  if (!description) return "";
  const formatted = description.split(/\s+/).filter(Boolean).join(" ");
  if (maxLength && formatted.length > maxLength) {
    return `${formatted.slice(0, Math.max(0, maxLength - 3))}...`;
  }
  return formatted;
}
