/**
 * Approximate serialized size of one item, in UTF-8 bytes of its JSON form.
 */
export function approximateSize(value: unknown): number {
  const json = JSON.stringify(value);
  return json === undefined ? 0 : Buffer.byteLength(json, 'utf8');
}
