// src/domain/task-markers.ts
// Deterministic task-marker detection for triage. Pure: summary + kind in, boolean out.
//
// A summary is a task when, after NFKC width folding, it starts with
// TODO / TASK / REMINDER (any case), plain or wrapped as [TODO] / (TODO) / 【TODO】,
// optionally behind markdown wrappers:
//   - blockquotes:   "> ", ">> "
//   - bullets:       - * + • ‣ ∙ ·  (followed by whitespace)
//   - checkboxes:    [ ] [x] [X] [✓] [✔]  (followed by whitespace)
//   - ordered lists: 1.  1)  (1)  a.  a)  (a)  iv.  iv)  (iv)
// and followed by ':' / '：', whitespace, a dash variant, or end of string.
//
//   "TODO: rotate runbook"    → true
//   "- [ ] TASK: fix it"      → true
//   "(1) REMINDER - call back" → true
//   "TODOXYZ"                 → false

const MARKERS = ["TODO", "TASK", "REMINDER"] as const;
const SEPARATORS = new Set([":", "：", "-", "－", "–", "—", "−"]);
const BULLETS = new Set(["-", "*", "+", "•", "‣", "∙", "·"]);
const CHECKBOX_MARKS = new Set([" ", "x", "X", "✓", "✔"]);
const CLOSE_BY_OPEN: Record<string, string> = { "[": "]", "(": ")", "【": "】" };
const ROMAN = /^M{0,3}(CM|CD|D?C{0,3})(XC|XL|L?X{0,3})(IX|IV|V?I{0,3})$/;

const isSpace = (ch: string | undefined): boolean => ch !== undefined && /\s/.test(ch);
const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= "0" && ch <= "9";
const isAsciiLetter = (ch: string | undefined): boolean =>
  ch !== undefined && ((ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z"));

/** Width/form folding used before any marker comparison. Locale independent. */
export function normalizeSummary(summary: string): string {
  return (summary ?? "").normalize("NFKC");
}

function startsWithMarker(text: string, offset: number, marker: string): boolean {
  return text.slice(offset, offset + marker.length).toUpperCase() === marker;
}

function hasValidSuffix(text: string, idx: number): boolean {
  if (idx === text.length) return true;
  const next = text[idx];
  return SEPARATORS.has(next) || isSpace(next);
}

function matchesMarkerPrefix(text: string): boolean {
  for (const marker of MARKERS) {
    if (startsWithMarker(text, 0, marker) && hasValidSuffix(text, marker.length)) return true;
  }

  const close = CLOSE_BY_OPEN[text[0] ?? ""];
  if (!close) return false;
  for (const marker of MARKERS) {
    if (!startsWithMarker(text, 1, marker)) continue;
    const closeIdx = 1 + marker.length;
    if (text[closeIdx] !== close) continue;
    if (hasValidSuffix(text, closeIdx + 1)) return true;
  }
  return false;
}

function isRomanToken(token: string): boolean {
  return token.length > 0 && ROMAN.test(token.toUpperCase());
}

function stripOrderedPrefix(value: string): string {
  // (1) / (a) / (iv)
  if (value.length >= 4 && value[0] === "(") {
    let j = 1;
    while (isDigit(value[j])) j++;
    if (j > 1 && value[j] === ")" && isSpace(value[j + 1])) return value.slice(j + 1).trimStart();

    let k = 1;
    while (isAsciiLetter(value[k])) k++;
    if (k > 1 && value[k] === ")" && isSpace(value[k + 1])) {
      const token = value.slice(1, k);
      if (token.length === 1 || isRomanToken(token)) return value.slice(k + 1).trimStart();
    }
  }

  // 1. / 1)
  let i = 0;
  while (isDigit(value[i])) i++;
  if (i > 0) {
    if ((value[i] === "." || value[i] === ")") && isSpace(value[i + 1])) return value.slice(i + 1).trimStart();
    return value;
  }

  // a. / a) / iv.
  let j = 0;
  while (isAsciiLetter(value[j])) j++;
  if (j > 0 && (value[j] === "." || value[j] === ")") && isSpace(value[j + 1])) {
    const token = value.slice(0, j);
    if (token.length === 1 || isRomanToken(token)) return value.slice(j + 1).trimStart();
  }
  return value;
}

/** Strip blockquote, bullet, checkbox and ordered-list wrappers until none apply. */
export function stripListPrefix(text: string): string {
  let t = text;
  let changed = true;
  while (changed) {
    changed = false;

    let depth = 0;
    while (t[depth] === ">") depth++;
    if (depth >= 1 && isSpace(t[depth])) {
      t = t.slice(depth).trimStart();
      changed = true;
    }

    if (BULLETS.has(t[0] ?? "") && isSpace(t[1])) {
      t = t.slice(1).trimStart();
      changed = true;
    }

    if (t.length >= 4 && t[0] === "[" && t[2] === "]" && CHECKBOX_MARKS.has(t[1]) && isSpace(t[3])) {
      t = t.slice(3).trimStart();
      changed = true;
    }

    const ordered = stripOrderedPrefix(t);
    if (ordered !== t) {
      t = ordered;
      changed = true;
    }
  }
  return t;
}

export function summaryHasTaskMarker(summary: string): boolean {
  const s = normalizeSummary(summary).trimStart();
  if (!s) return false;
  if (matchesMarkerPrefix(s)) return true;
  const stripped = stripListPrefix(s);
  return stripped !== "" && stripped !== s && matchesMarkerPrefix(stripped);
}

/** kind == "task" (case/space-insensitive) or a task marker in the summary. */
export function isTaskCandidate(record: { kind?: string | null; summary?: string | null }): boolean {
  const kind = (record.kind ?? "").trim().toLowerCase();
  if (kind === "task") return true;
  const summary = (record.summary ?? "").trim();
  return summary !== "" && summaryHasTaskMarker(summary);
}
