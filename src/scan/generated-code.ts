const GENERATED_MARKERS = [/@generated\b/, /<auto-generated/i];

/*
 * True when the comment header at the top of a file marks it as generated.
 * Only comments before the first line of code are looked at.
 */
export function isGeneratedSource(content: string): boolean {
  let inBlockComment = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (inBlockComment) {
      if (GENERATED_MARKERS.some((m) => m.test(line))) return true;
      if (line.includes('*/')) inBlockComment = false;
      continue;
    }

    if (line === '' || line.startsWith('#!')) continue;

    if (line.startsWith('//')) {
      if (GENERATED_MARKERS.some((m) => m.test(line))) return true;
      continue;
    }

    if (line.startsWith('/*')) {
      if (GENERATED_MARKERS.some((m) => m.test(line))) return true;
      inBlockComment = !line.includes('*/', 2);
      continue;
    }

    return false;
  }

  return false;
}
