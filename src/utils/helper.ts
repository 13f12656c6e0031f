import os from "node:os";
import path from "node:path";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

/**
 * 依 Unicode code point 排序，不受語系影響。
 * 與 UTF-16 code unit 排序不同之處在於 U+10000 以上的字元排在 U+E000–U+FFFF 之後。
 */
export function byCodePoint(a: string, b: string) {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(j) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    i += ca > 0xffff ? 2 : 1;
    j += cb > 0xffff ? 2 : 1;
  }
  const restA = a.length - i;
  const restB = b.length - j;
  if (restA === restB) return 0;
  return restA < restB ? -1 : 1;
}
