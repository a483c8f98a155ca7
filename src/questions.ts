import fs from "node:fs/promises";
import { findNodeAtLocation, getNodeValue, parseTree, printParseErrorCode } from "jsonc-parser";
import type { JSONPath, Node, ParseError } from "jsonc-parser";
import { QuestionFileError } from "./errors";
import type { QuestionSet, RawQuestion } from "./types";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseQuestion(id: string, value: unknown): RawQuestion {
  if (!isPlainObject(value)) throw new QuestionFileError(`Question ${id} must be an object`);

  const text = value.question_text;
  if (typeof text !== "string") throw new QuestionFileError(`Question ${id} is missing question_text`);

  const options = value.options;
  if (options === undefined) return { question_text: text };
  if (!Array.isArray(options) || !options.every((o): o is string => typeof o === "string")) {
    throw new QuestionFileError(`Question ${id} options must be a list of strings`);
  }
  return { question_text: text, options: [...options] };
}

function parseJsonTree(text: string, source: string): Node {
  const errors: ParseError[] = [];
  const root = parseTree(text, errors, { disallowComments: true, allowTrailingComma: false });
  const first = errors[0];
  if (first) {
    throw new QuestionFileError(
      `${source} is not valid JSON: ${printParseErrorCode(first.error)} at offset ${first.offset}`
    );
  }
  if (!root) throw new QuestionFileError(`${source} is empty`);
  return root;
}

// Walks the syntax tree instead of JSON.parse so ids keep file order; JS objects hoist integer-like keys.
export function parseQuestionText(text: string, options: { source?: string; path?: JSONPath } = {}): QuestionSet {
  const root = parseJsonTree(text, options.source ?? "questions");
  const node = options.path?.length ? findNodeAtLocation(root, options.path) : root;
  if (!node || node.type !== "object") {
    throw new QuestionFileError("Questions must be an object keyed by question id");
  }

  const out: QuestionSet = new Map();
  for (const property of node.children ?? []) {
    const [key, value] = property.children ?? [];
    if (!key || typeof key.value !== "string") continue;
    // a repeated id keeps its first position and its last value
    out.set(key.value, parseQuestion(key.value, value ? getNodeValue(value) : undefined));
  }
  return out;
}

export async function loadQuestions(file: string): Promise<QuestionSet> {
  const text = await fs.readFile(file, "utf8");
  return parseQuestionText(text, { source: file });
}
