/**
 * Remove the indentation shared by all non-blank lines, then trim
 *
 * Only spaces and tabs count as indentation; whitespace-only lines do not
 * constrain the common prefix.
 */
export function dedent(text: string): string {
  const lines = text.split("\n");
  let common: string | undefined;

  for (const line of lines) {
    if (line.trim().length === 0) {
      continue;
    }
    const indent = /^[ \t]*/.exec(line)?.[0] ?? "";
    common = common === undefined ? indent : sharedPrefix(common, indent);
  }

  const margin = common?.length ?? 0;
  const stripped = lines.map((line) =>
    line.trim().length === 0 ? line.replace(/^[ \t]+$/, "") : line.slice(margin)
  );
  return stripped.join("\n").trim();
}

function sharedPrefix(a: string, b: string): string {
  let i = 0;
  while (i < a.length && i < b.length && a[i] === b[i]) {
    i += 1;
  }
  return a.slice(0, i);
}
