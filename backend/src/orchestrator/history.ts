import type { Message, MessageMetadata, Role } from '../../../shared/types.js';

export function createMessage(role: Role, content: string, metadata?: MessageMetadata, timestamp = new Date().toISOString()): Message {
  const message: Message = metadata
    ? { role, content, timestamp, metadata: Object.freeze({ ...metadata }) }
    : { role, content, timestamp };
  return Object.freeze(message);
}

function frozen(message: Message): Message {
  return Object.isFrozen(message) ? message : createMessage(message.role, message.content, message.metadata, message.timestamp);
}

/**
 * Append-only message log owned by one session.
 *
 * Readers only ever see frozen arrays: `append` and `reset` publish a new array
 * instead of mutating the one a reader may still hold, so a snapshot is never
 * observed half-cleared or half-appended.
 */
export class ConversationHistory {
  private messages: readonly Message[];

  constructor(initial: readonly Message[] = []) {
    this.messages = Object.freeze(initial.map((message) => createMessage(message.role, message.content, message.metadata, message.timestamp)));
  }

  get size(): number {
    return this.messages.length;
  }

  append(message: Message): void {
    this.messages = Object.freeze([...this.messages, frozen(message)]);
  }

  /** Appends a committed user/agent pair in one step. */
  appendExchange(user: Message, agent: Message): void {
    if (user.role !== 'user' || agent.role !== 'agent') {
      throw new Error('An exchange must be a user message followed by an agent message.');
    }
    this.messages = Object.freeze([...this.messages, frozen(user), frozen(agent)]);
  }

  snapshot(): readonly Message[] {
    return this.messages;
  }

  lastUserMessage(): Message | undefined {
    for (let index = this.messages.length - 1; index >= 0; index -= 1) {
      const message = this.messages[index];
      if (message?.role === 'user') {
        return message;
      }
    }
    return undefined;
  }

  reset(): void {
    this.messages = Object.freeze([]);
  }
}
