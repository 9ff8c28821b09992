import { InvalidTransitionError, WorkflowError } from "./errors.js";

export type MessageRole = "user" | "agent" | "human";

/**
 * One entry of a run transcript. Frozen once appended.
 */
export type Message = {
  readonly index: number;
  /** "user" for the seed input, the agent name, or "human" */
  readonly author: string;
  readonly role: MessageRole;
  readonly content: string;
  /** Discussion round (round-robin topology only) */
  readonly round?: number;
};

export type NewMessage = {
  author: string;
  role: MessageRole;
  content: string;
  round?: number;
};

/**
 * Append-only ordered transcript shared by every turn of a run.
 */
export class ConversationState {
  private readonly messages: Message[] = [];
  private closed = false;

  static from(messages: readonly Message[]): ConversationState {
    const conversation = new ConversationState();
    messages.forEach((message, position) => {
      if (message.index !== position) {
        throw new WorkflowError(
          "STORE_FAILED",
          `Transcript index ${message.index} found at position ${position}`
        );
      }
      conversation.messages.push(Object.freeze({ ...message }));
    });
    return conversation;
  }

  get length(): number {
    return this.messages.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  append(message: NewMessage): Message {
    if (this.closed) {
      throw new InvalidTransitionError("Cannot append to the transcript of a finished run");
    }
    const entry: Message = Object.freeze({
      index: this.messages.length,
      author: message.author,
      role: message.role,
      content: message.content,
      ...(message.round !== undefined && { round: message.round })
    });
    this.messages.push(entry);
    return entry;
  }

  last(): Message | undefined {
    return this.messages[this.messages.length - 1];
  }

  snapshot(): readonly Message[] {
    return Object.freeze([...this.messages]);
  }

  /** Called when the owning run becomes terminal. */
  close(): void {
    this.closed = true;
  }
}
