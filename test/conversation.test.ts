import { describe, expect, it } from "vitest";
import { ConversationState } from "../src/conductor/conversation.js";
import { InvalidTransitionError, WorkflowError } from "../src/conductor/errors.js";

describe("ConversationState", () => {
  it("assigns strictly increasing indexes from 0", () => {
    const conversation = new ConversationState();
    const first = conversation.append({ author: "user", role: "user", content: "hello" });
    const second = conversation.append({ author: "A", role: "agent", content: "hi" });

    expect(first.index).toBe(0);
    expect(second.index).toBe(1);
    expect(conversation.length).toBe(2);
    expect(conversation.last()).toEqual({ index: 1, author: "A", role: "agent", content: "hi" });
  });

  it("keeps the round only when given", () => {
    const conversation = new ConversationState();
    const plain = conversation.append({ author: "A", role: "agent", content: "x" });
    const inRound = conversation.append({ author: "B", role: "agent", content: "y", round: 2 });

    expect("round" in plain).toBe(false);
    expect(inRound.round).toBe(2);
  });

  it("freezes appended messages and snapshots", () => {
    const conversation = new ConversationState();
    const message = conversation.append({ author: "user", role: "user", content: "hello" });
    const snapshot = conversation.snapshot();

    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it("returns snapshots unaffected by later appends", () => {
    const conversation = new ConversationState();
    conversation.append({ author: "user", role: "user", content: "hello" });
    const before = conversation.snapshot();
    conversation.append({ author: "A", role: "agent", content: "hi" });

    expect(before).toHaveLength(1);
    expect(conversation.snapshot()).toHaveLength(2);
  });

  it("rejects appends once closed", () => {
    const conversation = new ConversationState();
    conversation.append({ author: "user", role: "user", content: "hello" });
    conversation.close();

    expect(conversation.isClosed).toBe(true);
    expect(() => conversation.append({ author: "A", role: "agent", content: "late" })).toThrow(InvalidTransitionError);
    expect(conversation.length).toBe(1);
  });

  it("returns undefined from last() when empty", () => {
    expect(new ConversationState().last()).toBeUndefined();
  });

  describe("from", () => {
    it("rebuilds a transcript and continues its numbering", () => {
      const conversation = ConversationState.from([
        { index: 0, author: "user", role: "user", content: "hello" },
        { index: 1, author: "A", role: "agent", content: "hi", round: 1 }
      ]);
      const next = conversation.append({ author: "human", role: "human", content: "ok" });

      expect(next.index).toBe(2);
      expect(conversation.snapshot()[1]).toEqual({ index: 1, author: "A", role: "agent", content: "hi", round: 1 });
    });

    it("rejects a transcript with a gap", () => {
      expect(() =>
        ConversationState.from([
          { index: 0, author: "user", role: "user", content: "hello" },
          { index: 2, author: "A", role: "agent", content: "hi" }
        ])
      ).toThrow(WorkflowError);
    });
  });
});
