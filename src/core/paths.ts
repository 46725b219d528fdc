export function toPosixPath(p: string): string {
  return String(p).replace(/\\/g, '/');
}

export function splitPosixPath(p: string): string[] {
  return toPosixPath(p).split('/').filter(Boolean);
}

/** `theories/Arith/Plus.v` -> `theories.Arith.Plus` */
export function modulePathFromFile(file: string): string {
  const parts = splitPosixPath(file);
  const last = parts.pop();
  if (last === undefined) return '';
  const dot = last.lastIndexOf('.');
  parts.push(dot > 0 ? last.slice(0, dot) : last);
  return parts.join('.');
}

export function replaceExtension(file: string, ext: string): string {
  const posix = toPosixPath(file);
  const slash = posix.lastIndexOf('/');
  const dot = posix.lastIndexOf('.');
  if (dot <= slash + 1) return posix + ext;
  return posix.slice(0, dot) + ext;
}
