/**
 * Session Store
 *
 * In-memory conversation history, keyed by session id. Each exchange adds
 * one user and one assistant message; only the newest `maxHistory`
 * exchanges are kept.
 */

export interface SessionMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface SessionStoreOptions {
  /** Exchanges kept per session (default: 2) */
  maxHistory?: number;
}

export class SessionStore {
  private readonly sessions = new Map<string, SessionMessage[]>();
  private readonly maxMessages: number;
  private counter = 0;

  constructor(options: SessionStoreOptions = {}) {
    this.maxMessages = Math.max(0, options.maxHistory ?? 2) * 2;
  }

  /** Create an empty session and return its id (`session_1`, `session_2`, ...) */
  createSession(): string {
    this.counter++;
    const id = `session_${this.counter}`;
    this.sessions.set(id, []);
    return id;
  }

  hasSession(id: string): boolean {
    return this.sessions.has(id);
  }

  addMessage(id: string, role: SessionMessage['role'], content: string): void {
    const messages = this.sessions.get(id) ?? [];
    messages.push({ role, content });

    if (messages.length > this.maxMessages) {
      messages.splice(0, messages.length - this.maxMessages);
    }
    this.sessions.set(id, messages);
  }

  /** Record a question/answer pair. Unknown ids start a new session. */
  addExchange(id: string, userMessage: string, assistantMessage: string): void {
    this.addMessage(id, 'user', userMessage);
    this.addMessage(id, 'assistant', assistantMessage);
  }

  getMessages(id: string): readonly SessionMessage[] {
    return this.sessions.get(id) ?? [];
  }

  /**
   * History formatted for the system prompt, or null when there is none.
   */
  getHistory(id: string): string | null {
    const messages = this.sessions.get(id);
    if (messages === undefined || messages.length === 0) {
      return null;
    }

    return messages
      .map((message) => `${message.role === 'user' ? 'User' : 'Assistant'}: ${message.content}`)
      .join('\n');
  }

  clearSession(id: string): void {
    if (this.sessions.has(id)) {
      this.sessions.set(id, []);
    }
  }

  get size(): number {
    return this.sessions.size;
  }
}
