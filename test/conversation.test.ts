import test from "node:test";
import assert from "node:assert/strict";
import { PromptTurnError } from "../src/errors";
import { buildConversationPrompt, Conversation } from "../src/prompt/conversation";

test("single user turn renders start marker and an open instruction", () => {
  assert.equal(buildConversationPrompt(["Hi"], []), "<s> [INST] Hi [/INST]");
});

test("answered turns are closed with the end marker", () => {
  assert.equal(
    buildConversationPrompt(["a", "b", "c"], ["x", "y"]),
    "<s> [INST] a [/INST] x </s> [INST] b [/INST] y </s> [INST] c [/INST]"
  );
});

test("messages are embedded verbatim, newlines included", () => {
  assert.equal(buildConversationPrompt(["line 1\nline 2"], []), "<s> [INST] line 1\nline 2 [/INST]");
});

test("rejects histories that do not end on an unanswered user turn", () => {
  assert.throws(() => buildConversationPrompt(["Hi"], ["Hello"]), PromptTurnError);
  assert.throws(() => buildConversationPrompt([], []), PromptTurnError);
  assert.throws(() => buildConversationPrompt(["a", "b", "c"], ["x"]), {
    name: "PromptTurnError",
    message: "Expected exactly one more user message than bot messages, got 3 user and 1 bot"
  });
});

test("Conversation builds prompts without committing the pending turn", () => {
  const conversation = new Conversation({ user: "Be brief.", bot: "Sure." });
  assert.equal(conversation.promptFor("Hi"), "<s> [INST] Be brief. [/INST] Sure. </s> [INST] Hi [/INST]");
  assert.equal(conversation.userTurns, 1);
  assert.equal(conversation.botTurns, 1);

  conversation.append("Hi", "Hello");
  assert.deepEqual(conversation.snapshot(), { user: ["Be brief.", "Hi"], bot: ["Sure.", "Hello"] });

  conversation.reset();
  assert.deepEqual(conversation.snapshot(), { user: [], bot: [] });
  assert.equal(conversation.promptFor("again"), "<s> [INST] again [/INST]");
});
