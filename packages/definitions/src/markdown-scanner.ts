import { MalformedDefinitionError } from "@agentmd/types";

export interface ScannedSection {
  /** snake_case label used for lookups. */
  label: string;
  /** Label as written in the marker. */
  displayLabel: string;
  /** 1-based line of the marker. */
  line: number;
  body: string[];
}

export interface FenceInfo {
  char: "`" | "~";
  length: number;
  info: string;
}

export interface ScanResult {
  sections: ScannedSection[];
  warnings: string[];
}

const FENCE_OPEN = /^(`{3,}|~{3,})\s*([^\s`]*)/;

export const normalizeLabel = (label: string): string =>
  label.trim().toLowerCase().replace(/[\s-]+/g, "_");

export const matchFenceOpening = (line: string): FenceInfo | null => {
  const match = FENCE_OPEN.exec(line.trim());
  if (!match) {
    return null;
  }
  const [, fence = "", info = ""] = match;
  return {
    char: fence.startsWith("~") ? "~" : "`",
    length: fence.length,
    info: info.toLowerCase(),
  };
};

export const closesFence = (line: string, fence: FenceInfo): boolean => {
  const trimmed = line.trim();
  return (
    trimmed.length >= fence.length &&
    trimmed.split("").every((char) => char === fence.char)
  );
};

/**
 * Splits a definition body into marker-delimited sections. Markers inside
 * fenced blocks are ordinary text.
 */
export const scanSections = (lines: readonly string[], offset: number): ScanResult => {
  const sections: ScannedSection[] = [];
  const warnings: string[] = [];
  let current: ScannedSection | null = null;
  let fence: (FenceInfo & { line: number }) | null = null;

  for (const [index, line] of lines.entries()) {
    const lineNumber = offset + index + 1;
    const trimmed = line.trim();

    if (fence) {
      if (closesFence(trimmed, fence)) {
        fence = null;
      }
      current?.body.push(line);
      continue;
    }

    const opening = matchFenceOpening(trimmed);
    if (opening) {
      fence = { ...opening, line: lineNumber };
      current?.body.push(line);
      continue;
    }

    if (trimmed.startsWith("<!--")) {
      const end = trimmed.indexOf("-->", 4);
      if (end === -1) {
        throw new MalformedDefinitionError(
          "Section marker is not terminated",
          lineNumber,
        );
      }
      const displayLabel = trimmed.slice(4, end).trim();
      if (!displayLabel) {
        warnings.push(`empty section marker on line ${lineNumber} ignored`);
        continue;
      }
      if (trimmed.slice(end + 3).trim()) {
        warnings.push(
          `text after section marker "${displayLabel}" on line ${lineNumber} ignored`,
        );
      }
      current = {
        label: normalizeLabel(displayLabel),
        displayLabel,
        line: lineNumber,
        body: [],
      };
      sections.push(current);
      continue;
    }

    current?.body.push(line);
  }

  if (fence) {
    throw new MalformedDefinitionError("Fenced block is not closed", fence.line);
  }

  return { sections, warnings };
};

export interface UnwrappedBody {
  tag: string | null;
  text: string;
  trailingText: boolean;
}

const trimBlankLines = (lines: readonly string[]): string[] => {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start]?.trim() === "") start += 1;
  while (end > start && lines[end - 1]?.trim() === "") end -= 1;
  return lines.slice(start, end);
};

/**
 * Returns the content of a section body. A body that opens with a fenced
 * block yields the block's content and its info word as `tag`.
 */
export const unwrapBody = (body: readonly string[]): UnwrappedBody => {
  const first = body.findIndex((line) => line.trim().length > 0);
  const opening = first === -1 ? null : matchFenceOpening(body[first] ?? "");
  if (!opening) {
    return { tag: null, text: trimBlankLines(body).join("\n"), trailingText: false };
  }

  const closing = body.findIndex(
    (line, index) => index > first && closesFence(line, opening),
  );
  const end = closing === -1 ? body.length : closing;
  return {
    tag: opening.info || null,
    text: body.slice(first + 1, end).join("\n"),
    trailingText:
      closing !== -1 && body.slice(closing + 1).some((line) => line.trim().length > 0),
  };
};
