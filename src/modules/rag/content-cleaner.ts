const TABLE_SEPARATOR_PATTERN = /\|[- |]+\|/g;

const extractTableText = (content: string): string[] => {
  const rows: string[] = [];
  for (const line of content.split("\n")) {
    if (!line.trim().startsWith("|")) {
      continue;
    }
    const cells = line
      .split("|")
      .map((cell) => cell.trim())
      .filter((cell) => cell.length > 0);
    if (cells.length > 0) {
      rows.push(cells.join(" "));
    }
  }
  return rows;
};

/**
 * Flattens markdown chunks to plain prose: table separators are dropped, a
 * chunk containing table rows is reduced to their cell text, whitespace is
 * collapsed and stray backslash escapes are removed.
 */
export const cleanContent = (raw: string): string => {
  let content = raw.replace(TABLE_SEPARATOR_PATTERN, "");

  const tableRows = extractTableText(content);
  if (tableRows.length > 0) {
    content = tableRows.join(" ");
  }

  content = content.replace(/\n+/g, " ").replace(/\s+/g, " ");

  return content
    .replaceAll("\\n", " ")
    .replaceAll('\\"', '"')
    .replaceAll("\\'", "'")
    .replaceAll("\\_{", "_")
    .replaceAll("\\", "")
    .trim();
};
