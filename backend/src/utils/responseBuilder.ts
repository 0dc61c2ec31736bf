/**
 * Collects the pieces of a proxy reply and renders them in the one shape the
 * chat client accepts. Anything other than a sole error is delivered as a 200
 * so partial successes still reach the user.
 */

// U+200B ZERO WIDTH SPACE keeps the tags from being rendered by the client
export const PROXY_TAG_OPEN = '\u200b<proxy>\n';
export const PROXY_TAG_CLOSE = '\n\u200b</proxy>';

export type ResponseFragment =
  | { kind: 'chat'; text: string }
  | { kind: 'proxy'; text: string }
  | { kind: 'error'; text: string; status: number };

export interface BuiltResponse {
  status: number;
  contentType: string;
  body: string;
}

export interface ResponseBuilderOptions {
  /** Deliver the whole reply as one server-sent event. */
  stream?: boolean;
  /** Render a sole error as `{"error": ...}`, for connectivity tests. */
  wrapErrors?: boolean;
}

const JSON_TYPE = 'application/json; charset=utf-8';

export class ResponseBuilder {
  private readonly fragments: ResponseFragment[] = [];
  private readonly stream: boolean;
  private readonly wrapErrors: boolean;

  constructor(options: ResponseBuilderOptions = {}) {
    this.stream = options.stream ?? false;
    this.wrapErrors = options.wrapErrors ?? false;
  }

  addError(text: string, status: number): this {
    this.fragments.push({ kind: 'error', text, status });
    return this;
  }

  addMessage(...texts: string[]): this {
    for (const text of texts) this.fragments.push({ kind: 'chat', text });
    return this;
  }

  addProxyMessage(...texts: string[]): this {
    for (const text of texts) this.fragments.push({ kind: 'proxy', text });
    return this;
  }

  get size(): number {
    return this.fragments.length;
  }

  /** The sole fragment's status when it is an error, 200 otherwise. */
  get status(): number {
    const sole = this.soleError();
    return sole ? sole.status : 200;
  }

  /** True once any error was added, even when the reply is still delivered as a 200. */
  get hasErrors(): boolean {
    return this.fragments.some((f) => f.kind === 'error');
  }

  get message(): string {
    if (this.fragments.length === 0) return '';

    if (this.fragments.length === 1) {
      const [fragment] = this.fragments;
      switch (fragment.kind) {
        case 'chat':
          return fragment.text;
        case 'error':
          return this.wrapErrors ? `PROXY ERROR ${fragment.status}: ${fragment.text}` : fragment.text;
        case 'proxy':
          return `${PROXY_TAG_OPEN}${fragment.text}${PROXY_TAG_CLOSE}`;
      }
    }

    const groups: string[] = [];
    let run: ResponseFragment[] = [];
    const flush = () => {
      if (run.length === 0) return;
      if (run[0].kind === 'chat') {
        groups.push(run.map((f) => f.text).join('\n'));
      } else {
        const lines = run.map((f) => (f.kind === 'error' ? `Error ${f.status}: ${f.text}` : f.text));
        groups.push(`${PROXY_TAG_OPEN}${lines.join('\n')}${PROXY_TAG_CLOSE}`);
      }
      run = [];
    };

    for (const fragment of this.fragments) {
      if (run.length > 0 && (run[0].kind === 'chat') !== (fragment.kind === 'chat')) {
        flush();
      }
      run.push(fragment);
    }
    flush();

    return groups.join('\n');
  }

  build(): BuiltResponse {
    const sole = this.soleError();
    if (sole) {
      if (this.wrapErrors) {
        return { status: sole.status, contentType: JSON_TYPE, body: JSON.stringify({ error: this.message.trim() }) };
      }
      return { status: sole.status, contentType: 'text/plain; charset=utf-8', body: this.message };
    }

    if (this.stream) {
      const event = JSON.stringify({
        choices: [{ index: 0, delta: { content: this.message }, finish_reason: 'stop' }]
      });
      return {
        status: 200,
        contentType: 'text/event-stream; charset=utf-8',
        body: `data: ${event}\n\ndata: [DONE]\n\n`
      };
    }

    return {
      status: 200,
      contentType: JSON_TYPE,
      body: JSON.stringify({
        choices: [{ index: 0, message: { role: 'assistant', content: this.message }, finish_reason: 'stop' }]
      })
    };
  }

  buildError(text: string, status: number): BuiltResponse {
    return this.addError(text, status).build();
  }

  private soleError(): Extract<ResponseFragment, { kind: 'error' }> | undefined {
    if (this.fragments.length !== 1) return undefined;
    const [fragment] = this.fragments;
    return fragment.kind === 'error' ? fragment : undefined;
  }
}

export default ResponseBuilder;
