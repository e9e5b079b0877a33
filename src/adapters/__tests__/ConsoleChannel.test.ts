import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { ConsoleChannel, formatActions, parseConsoleLine } from '../console/ConsoleChannel.js';
import type { InboundSignal } from '../../types.js';

describe('parseConsoleLine', () => {
  it('should map commands onto signals', () => {
    expect(parseConsoleLine('n', 'console', false)).toEqual({ type: 'next', requesterId: 'console' });
    expect(parseConsoleLine(' NEXT ', 'console', false)).toEqual({ type: 'next', requesterId: 'console' });
    expect(parseConsoleLine('prev', 'console', false)).toEqual({ type: 'previous', requesterId: 'console' });
    expect(parseConsoleLine('post', 'console', false)).toEqual({ type: 'post', requesterId: 'console' });
  });

  it('should treat other lines as text and ignore blank ones', () => {
    expect(parseConsoleLine('hello there', 'console', false)).toEqual({
      type: 'text',
      requesterId: 'console',
      text: 'hello there',
    });
    expect(parseConsoleLine('   ', 'console', false)).toBeNull();
  });

  it('should read every line as an answer while a prompt is open', () => {
    expect(parseConsoleLine('next', 'console', true)).toEqual({
      type: 'text',
      requesterId: 'console',
      text: 'next',
    });
  });
});

describe('formatActions', () => {
  it('should label each action', () => {
    expect(formatActions(['previous', 'post', 'next'])).toBe('[p] Previous  [post] Post  [n] Next');
    expect(formatActions(['post-next'])).toBe('[n] Next');
  });
});

describe('ConsoleChannel', () => {
  let input: PassThrough;
  let written: string[];
  let channel: ConsoleChannel;
  let received: InboundSignal[];

  beforeEach(() => {
    input = new PassThrough();
    written = [];
    const output = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        written.push(chunk.toString());
        callback();
      },
    });
    received = [];
    channel = new ConsoleChannel({ requesterId: 'console', input, output });
    channel.onSignal(async (signal) => {
      received.push(signal);
    });
  });

  afterEach(async () => {
    await channel.stop();
  });

  it('should print the help line on start', async () => {
    await channel.start();

    expect(written).toEqual([
      'Commands: n / next, p / prev, post. Anything else answers the open prompt.\n',
    ]);
  });

  it('should print a presentation with its caption and actions', async () => {
    await channel.presentArtifact({
      requesterId: 'console',
      artifact: { path: '/tmp/clips/2.mp4', source: 'https://www.example.com/video/2' },
      navIndex: 1,
      captionText: 'Original Caption: Hello',
      actions: ['previous', 'post', 'next'],
    });

    expect(written).toEqual([
      '▶ Video #2: /tmp/clips/2.mp4\nOriginal Caption: Hello\n[p] Previous  [post] Post  [n] Next\n',
    ]);
  });

  it('should print notifications with their actions', async () => {
    await channel.notify('console', 'Nothing yet', ['next']);
    await channel.notify('console', 'Plain');

    expect(written).toEqual(['Nothing yet\n[n] Next\n', 'Plain\n']);
  });

  it('should turn typed lines into signals', async () => {
    await channel.start();

    input.write('n\n');
    input.write('\n');
    input.write('p\n');
    await vi.waitFor(() => expect(received).toHaveLength(2));
    await channel.idle();

    expect(received).toEqual([
      { type: 'next', requesterId: 'console' },
      { type: 'previous', requesterId: 'console' },
    ]);
  });

  it('should treat lines as answers until the prompt is retracted', async () => {
    await channel.start();
    const promptId = await channel.requestText('console', 'What would you like to comment?');

    input.write('next\n');
    await vi.waitFor(() => expect(received).toHaveLength(1));
    await channel.retractPrompt('console', promptId);
    input.write('next\n');
    await vi.waitFor(() => expect(received).toHaveLength(2));

    expect(promptId).toBe('prompt-1');
    expect(written).toContain('? What would you like to comment?\n');
    expect(received).toEqual([
      { type: 'text', requesterId: 'console', text: 'next' },
      { type: 'next', requesterId: 'console' },
    ]);
  });

  it('should print handler failures', async () => {
    channel.onSignal(async () => {
      throw new Error('boom');
    });
    await channel.start();

    input.write('post\n');
    await vi.waitFor(() => expect(written).toContain('Error: boom\n'));
    await channel.idle();
  });
});
