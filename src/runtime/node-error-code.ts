/**
 * Node errors expose a string `code` (`ENOENT`, `EEXIST`, `Z_BUF_ERROR`, ...) that
 * the typings do not declare on `Error`. Read it without trusting the shape.
 */
export function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  const code: unknown = Reflect.get(e, 'code');
  return typeof code === 'string' ? code : undefined;
}
