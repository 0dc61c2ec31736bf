import { describe, it, expect } from 'vitest';
import { PROXY_TAG_CLOSE, PROXY_TAG_OPEN, ResponseBuilder } from '../utils/responseBuilder.js';

const wrap = (text: string) => `${PROXY_TAG_OPEN}${text}${PROXY_TAG_CLOSE}`;

describe('ResponseBuilder', () => {
  it('renders a sole error as its raw message and status', () => {
    const built = new ResponseBuilder().buildError('Bad input', 400);
    expect(built).toEqual({ status: 400, contentType: 'text/plain; charset=utf-8', body: 'Bad input' });
  });

  it('wraps a sole error for connectivity tests', () => {
    const built = new ResponseBuilder({ wrapErrors: true }).buildError('Bad input', 400);
    expect(built.status).toBe(400);
    expect(built.contentType).toBe('application/json; charset=utf-8');
    expect(built.body).toBe('{"error":"PROXY ERROR 400: Bad input"}');
  });

  it('delivers chat text with an error as a 200 composite', () => {
    const response = new ResponseBuilder().addMessage('A').addError('B', 404);
    expect(response.status).toBe(200);
    expect(response.hasErrors).toBe(true);
    expect(response.message).toBe(`A\n${wrap('Error 404: B')}`);
  });

  it('groups adjacent fragments of the same kind without reordering', () => {
    const response = new ResponseBuilder()
      .addMessage('A', 'B')
      .addProxyMessage('P1')
      .addError('E', 500)
      .addProxyMessage('P2')
      .addMessage('C');
    expect(response.size).toBe(6);
    expect(response.message).toBe(`A\nB\n${wrap('P1\nError 500: E\nP2')}\nC`);
  });

  it('wraps a sole proxy message', () => {
    expect(new ResponseBuilder().addProxyMessage('Hi').message).toBe(wrap('Hi'));
  });

  it('never wraps chat text, even for connectivity tests', () => {
    expect(new ResponseBuilder({ wrapErrors: true }).addMessage('TEST').message).toBe('TEST');
  });

  it('builds a chat completion body', () => {
    const built = new ResponseBuilder().addMessage('Hello').build();
    expect(built.status).toBe(200);
    expect(built.contentType).toBe('application/json; charset=utf-8');
    expect(JSON.parse(built.body)).toEqual({
      choices: [{ index: 0, message: { role: 'assistant', content: 'Hello' }, finish_reason: 'stop' }]
    });
  });

  it('builds a single event stream when asked to', () => {
    const built = new ResponseBuilder({ stream: true }).addMessage('Hello').addProxyMessage('Note').build();
    expect(built.contentType).toBe('text/event-stream; charset=utf-8');
    const [event, done] = built.body.split('\n\n');
    expect(done).toBe('data: [DONE]');
    expect(JSON.parse(event.slice('data: '.length))).toEqual({
      choices: [{ index: 0, delta: { content: `Hello\n${wrap('Note')}` }, finish_reason: 'stop' }]
    });
  });

  it('does not stream a sole error', () => {
    const built = new ResponseBuilder({ stream: true }).buildError('Slow down', 429);
    expect(built.status).toBe(429);
    expect(built.body).toBe('Slow down');
  });

  it('renders nothing as an empty completion', () => {
    const response = new ResponseBuilder();
    expect(response.message).toBe('');
    expect(response.status).toBe(200);
    expect(response.hasErrors).toBe(false);
  });
});
