import type { Message, Role } from "./types"

function textMessage(role: Role, text: string): Message {
  return { role, content: [{ type: "text", text }] }
}

function copyMessage(message: Message): Message {
  return { role: message.role, content: message.content.map((block) => ({ ...block })) }
}

/**
 * Ordered message log for one conversation. Appends are chronological;
 * the only removal besides {@link reset} is {@link rollbackLast}, used to
 * undo a user message whose agent call failed.
 */
export class ConversationHistory {
  private _messages: Message[] = []

  get length(): number {
    return this._messages.length
  }

  /** Snapshot of the history; mutating it does not affect the session. */
  get messages(): Message[] {
    return this._messages.map(copyMessage)
  }

  appendUser(text: string): Message {
    return this.append(textMessage("user", text))
  }

  appendAssistant(text: string): Message {
    return this.append(textMessage("assistant", text))
  }

  rollbackLast(): Message | undefined {
    return this._messages.pop()
  }

  reset(): void {
    this._messages = []
  }

  recent(n: number): Message[] {
    if (n <= 0) return []
    return this.messages.slice(-n)
  }

  private append(message: Message): Message {
    this._messages.push(message)
    return copyMessage(message)
  }
}

/** Joins the text blocks of a message, skipping tool blocks. */
export function messageText(message: Message): string {
  return message.content
    .map((block) => (block.type === "text" ? block.text : ""))
    .join("")
}
