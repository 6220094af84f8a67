const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** Local time as `YYYYMMDD_HHMMSS`. */
export function fileTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** Make a step label safe for a file name: spaces become `_`, slashes `-`. */
export function sanitizeLabel(label: string): string {
  return label.replace(/\s+/g, '_').replace(/[\\/]/g, '-');
}

/** Lower-case slug for output file names derived from a topic. */
export function slugify(text: string, maxLength = 40): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, maxLength);
  return slug || 'untitled';
}
