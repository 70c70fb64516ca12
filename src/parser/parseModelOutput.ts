import { failed, isRecord, ok, type Outcome } from "../utils/outcome";

type ParsedObject = Record<string, unknown>;

type HeuristicStory = {
  title: string;
  acceptanceCriteria: string[];
};

const TITLE_LINE = /^title\s*:\s*(.*)$/i;
const NUMBERED_LINE = /^\d+\.\s+(.*)$/;
const TITLE_PAIR = /"title"\s*:\s*"((?:[^"\\]|\\.)*)"/i;

/**
 * Recovers a structured object from raw model text. Stages run in order and
 * the first one that yields an object wins:
 *   1. the whole text, minus fences/backticks and a leading `json` marker
 *   2. the slice between the first `{` and the last `}`
 *   3. line-by-line reconstruction of titles and bullet criteria
 * Returns null when nothing usable is found; never throws.
 */
export function parseModelOutput(raw: string): ParsedObject | null {
  const stripped = stripWrapper(String(raw ?? ""));
  if (!stripped) return null;

  const stages = [
    () => decodeObject(stripped),
    () => decodeBraceSlice(stripped),
    () => reconstructFromLines(stripped)
  ];

  for (const stage of stages) {
    const outcome = stage();
    if (outcome.ok) return outcome.value;
  }

  return null;
}

export function stripWrapper(raw: string) {
  let candidate = raw.trim().replace(/^[`\s]+/, "").replace(/[`\s]+$/, "");
  if (candidate.startsWith("json\n")) {
    candidate = candidate.slice(5);
  }
  return candidate;
}

/* ================= STAGE 1 / 2 ================= */

function decodeObject(text: string): Outcome<ParsedObject> {
  const decoded = tryParseJson(text);
  return decoded.ok && isRecord(decoded.value) ? ok(decoded.value) : failed();
}

function decodeBraceSlice(text: string): Outcome<ParsedObject> {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return failed();
  return decodeObject(text.slice(start, end + 1));
}

function tryParseJson(candidate: string): Outcome<unknown> {
  const trimmed = candidate.trim();
  if (!trimmed) return failed();
  try {
    return ok(JSON.parse(trimmed));
  } catch {
    return failed();
  }
}

/* ================= STAGE 3 ================= */

function reconstructFromLines(text: string): Outcome<ParsedObject> {
  const candidates: HeuristicStory[] = [];
  let current: HeuristicStory | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const title = matchTitle(line);
    if (title !== null) {
      if (current) candidates.push(current);
      current = { title, acceptanceCriteria: [] };
      continue;
    }

    if (current && (line.startsWith("- ") || line.startsWith("* "))) {
      current.acceptanceCriteria.push(line.slice(2).replace(/,\s*$/, ""));
    }
  }
  if (current) candidates.push(current);

  const stories = candidates
    .map(c => ({
      title: c.title.trim(),
      acceptance_criteria: c.acceptanceCriteria
        .map(ac => ac.trim())
        .filter(ac => ac.length > 0)
    }))
    .filter(s => s.title.length > 0);

  return stories.length > 0 ? ok({ stories }) : failed();
}

function matchTitle(line: string): string | null {
  const labelled = TITLE_LINE.exec(line);
  if (labelled) return labelled[1];

  const numbered = NUMBERED_LINE.exec(line);
  if (numbered && !numbered[1].trim().toLowerCase().startsWith("acceptance")) {
    return numbered[1];
  }

  const pair = TITLE_PAIR.exec(line);
  if (pair) return pair[1].replace(/\\(.)/g, "$1");

  return null;
}
