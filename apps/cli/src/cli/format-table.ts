export const truncate = (text: string, max: number): string =>
  text.length > max ? `${text.slice(0, max)}...` : text;

export const formatTable = (header: string[], rows: string[][]): string => {
  const widths = header.map((cell, index) =>
    Math.max(cell.length, ...rows.map((row) => (row[index] ?? "").length)),
  );
  return [header, ...rows]
    .map((row) =>
      row
        .map((cell, index) => cell.padEnd(widths[index] ?? 0))
        .join("  ")
        .trimEnd(),
    )
    .join("\n");
};
