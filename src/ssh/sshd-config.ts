// sshd_config editing: pure text transforms, no I/O.
// sshd takes the FIRST value it sees for a keyword, and keywords after a `Match`
// line only apply inside that block, so edits are confined to the global section
// (everything before the first Match) and new lines are inserted ahead of it.

export type DirectiveAction = "replaced" | "appended" | "unchanged";

export interface DirectiveChange {
  readonly keyword: string;
  readonly value: string;
  readonly action: DirectiveAction;
  /** Later global lines for the same keyword that were dropped. */
  readonly removedDuplicates: number;
}

export interface DirectivePatch {
  readonly content: string;
  readonly changes: DirectiveChange[];
}

/** Keyword of an active (non-comment) line, lowercased; null for blanks and comments. */
export function lineKeyword(line: string): string | null {
  const trimmed = line.trim();
  if (trimmed === "" || trimmed.startsWith("#")) return null;
  const match = trimmed.match(/^([A-Za-z][A-Za-z0-9]*)(?:\s|=|$)/);
  return match ? match[1].toLowerCase() : null;
}

/** True when the config pulls in drop-in files that may override the global section. */
export function hasInclude(content: string): boolean {
  return content.split("\n").some((line) => lineKeyword(line) === "include");
}

/**
 * Set each directive in the global section: rewrite the first active line for the
 * keyword, drop later global duplicates, or insert a new line before the first Match.
 * Keywords compare case-insensitively, as sshd does. Directives apply in object order.
 */
export function patchDirectives(content: string, directives: Record<string, string>): DirectivePatch {
  const endsWithNewline = content.endsWith("\n");
  const lines = content === "" ? [] : content.split("\n");
  if (endsWithNewline) lines.pop();

  let globalEnd = lines.findIndex((line) => lineKeyword(line) === "match");
  if (globalEnd === -1) globalEnd = lines.length;

  const changes: DirectiveChange[] = [];
  for (const [keyword, value] of Object.entries(directives)) {
    const desired = `${keyword} ${value}`;
    const wanted = keyword.toLowerCase();
    const indices: number[] = [];
    for (let i = 0; i < globalEnd; i++) {
      if (lineKeyword(lines[i]) === wanted) indices.push(i);
    }

    if (indices.length === 0) {
      lines.splice(globalEnd, 0, desired);
      globalEnd++;
      changes.push({ keyword, value, action: "appended", removedDuplicates: 0 });
      continue;
    }

    const [first, ...duplicates] = indices;
    const unchanged = lines[first] === desired && duplicates.length === 0;
    lines[first] = desired;
    // Remove from the bottom so earlier indices stay valid
    for (const index of duplicates.reverse()) {
      lines.splice(index, 1);
      globalEnd--;
    }
    changes.push({ keyword, value, action: unchanged ? "unchanged" : "replaced", removedDuplicates: duplicates.length });
  }

  const appendedAny = changes.some((c) => c.action === "appended");
  const trailing = lines.length > 0 && (endsWithNewline || appendedAny) ? "\n" : "";
  return { content: lines.join("\n") + trailing, changes };
}

/** Backup file name stamped with local time: <path>.backup.YYYYMMDD_HHMMSS */
export function backupPathFor(configPath: string, at: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const stamp = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}_${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `${configPath}.backup.${stamp}`;
}
