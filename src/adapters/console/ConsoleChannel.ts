import * as readline from 'node:readline';
import type { NotificationChannel, SignalHandler } from '../../pipeline/collaborators.js';
import { errorMessage } from '../../pipeline/errors.js';
import type {
  ArtifactPresentation,
  InboundSignal,
  NavigationAction,
  PromptId,
  RequesterId,
} from '../../types.js';

export interface ConsoleChannelOptions {
  requesterId: RequesterId;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const ACTION_LABELS: Record<NavigationAction, string> = {
  previous: '[p] Previous',
  post: '[post] Post',
  next: '[n] Next',
  'post-next': '[n] Next',
};

const HELP_TEXT = 'Commands: n / next, p / prev, post. Anything else answers the open prompt.';

/**
 * Maps a typed line onto a signal. While a prompt is open every non-empty
 * line is an answer.
 */
export function parseConsoleLine(
  line: string,
  requesterId: RequesterId,
  answering: boolean
): InboundSignal | null {
  const text = line.trim();
  if (text.length === 0) {
    return null;
  }
  if (answering) {
    return { type: 'text', requesterId, text };
  }

  switch (text.toLowerCase()) {
    case 'n':
    case 'next':
      return { type: 'next', requesterId };
    case 'p':
    case 'prev':
    case 'previous':
      return { type: 'previous', requesterId };
    case 'post':
      return { type: 'post', requesterId };
    default:
      return { type: 'text', requesterId, text };
  }
}

export function formatActions(actions: readonly NavigationAction[]): string {
  return actions.map((action) => ACTION_LABELS[action]).join('  ');
}

/**
 * Terminal stand-in for a chat: presentations and prompts are printed, typed
 * lines come back as signals.
 */
export class ConsoleChannel implements NotificationChannel {
  private rl: readline.Interface | null = null;
  private handler: SignalHandler | null = null;
  private promptSeq = 0;
  private readonly openPrompts = new Map<PromptId, RequesterId>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(private readonly options: ConsoleChannelOptions) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  onSignal(handler: SignalHandler): void {
    this.handler = handler;
  }

  async start(): Promise<void> {
    if (this.rl) {
      return;
    }
    this.rl = readline.createInterface({ input: this.input, terminal: false });
    this.rl.on('line', (line) => this.dispatch(line));
    this.write(HELP_TEXT);
  }

  async stop(): Promise<void> {
    this.rl?.close();
    this.rl = null;
  }

  /** Resolves once every signal received so far has been handled */
  async idle(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  async presentArtifact(presentation: ArtifactPresentation): Promise<void> {
    const lines = [`▶ Video #${presentation.navIndex + 1}: ${presentation.artifact.path}`];
    if (presentation.captionText) {
      lines.push(presentation.captionText);
    }
    lines.push(formatActions(presentation.actions));
    this.write(lines.join('\n'));
  }

  async requestText(requesterId: RequesterId, prompt: string): Promise<PromptId> {
    this.promptSeq++;
    const promptId = `prompt-${this.promptSeq}`;
    this.openPrompts.set(promptId, requesterId);
    this.write(`? ${prompt}`);
    return promptId;
  }

  async retractPrompt(_requesterId: RequesterId, promptId: PromptId): Promise<void> {
    this.openPrompts.delete(promptId);
  }

  async notify(_requesterId: RequesterId, text: string, actions: NavigationAction[] = []): Promise<void> {
    this.write(actions.length > 0 ? `${text}\n${formatActions(actions)}` : text);
  }

  private dispatch(line: string): void {
    const signal = parseConsoleLine(line, this.options.requesterId, this.openPrompts.size > 0);
    const handler = this.handler;
    if (!signal || !handler) {
      return;
    }

    const task = handler(signal)
      .catch((error: unknown) => {
        this.write(`Error: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private write(text: string): void {
    this.output.write(`${text}\n`);
  }
}
