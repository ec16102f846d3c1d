/**
 * Replace `{{name}}` placeholders in one pass. Values are inserted literally, so email
 * text containing `$&` or `{{body}}` is never expanded again.
 */
export function interpolate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : placeholder
  );
}

/** First `max` UTF-16 units of `text`, one fewer when the cut would split a surrogate pair. */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  const last = text.charCodeAt(max - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? max - 1 : max;
  return text.slice(0, end);
}

/**
 * Map over `items` in consecutive batches of `batchSize`, each batch run with Promise.all.
 * Output order matches input order.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  batchSize: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const size = Math.max(1, Math.floor(batchSize));
  const out: R[] = [];
  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    const results = await Promise.all(batch.map((item, j) => fn(item, i + j)));
    out.push(...results);
  }
  return out;
}
