import type { ArtifactRef, PromptId, RequesterId } from '../types.js';

/**
 * 1: waiting for the comment, 2: waiting for hashtags, 3: posting dispatched
 */
export type PostFlowStage = 1 | 2 | 3;

export interface PendingPostFlow {
  requesterId: RequesterId;
  stage: PostFlowStage;
  artifact: ArtifactRef;
  comment: string;
  hashtags: string[];
  promptIds: PromptId[];
  updatedAt: number;
}

export type TextOutcome =
  | { status: 'ignored' }
  | { status: 'awaiting-hashtags'; flow: PendingPostFlow; retract: PromptId[] }
  | { status: 'ready'; flow: PendingPostFlow; retract: PromptId[] };

export function parseHashtags(text: string): string[] {
  return text.split(/\s+/).filter((tag) => tag.length > 0);
}

/**
 * Per-requester post flows. Each requester has at most one; starting a new
 * one replaces the old.
 */
export class PostFlowRegistry {
  private readonly flows = new Map<RequesterId, PendingPostFlow>();

  constructor(private readonly now: () => number = Date.now) {}

  get size(): number {
    return this.flows.size;
  }

  get(requesterId: RequesterId): PendingPostFlow | undefined {
    return this.flows.get(requesterId);
  }

  begin(requesterId: RequesterId, artifact: ArtifactRef): PendingPostFlow {
    const flow: PendingPostFlow = {
      requesterId,
      stage: 1,
      artifact,
      comment: '',
      hashtags: [],
      promptIds: [],
      updatedAt: this.now(),
    };
    this.flows.set(requesterId, flow);
    return flow;
  }

  trackPrompt(requesterId: RequesterId, promptId: PromptId): void {
    const flow = this.flows.get(requesterId);
    if (flow) {
      flow.promptIds.push(promptId);
    }
  }

  /**
   * Feeds a free-text reply into the requester's flow. On `ready` the flow has
   * already been removed from the registry.
   */
  acceptText(requesterId: RequesterId, text: string): TextOutcome {
    const flow = this.flows.get(requesterId);
    if (!flow || flow.stage === 3) {
      return { status: 'ignored' };
    }

    const retract = flow.promptIds;
    flow.promptIds = [];
    flow.updatedAt = this.now();

    if (flow.stage === 1) {
      flow.comment = text.trim();
      flow.stage = 2;
      return { status: 'awaiting-hashtags', flow, retract };
    }

    flow.hashtags = parseHashtags(text);
    flow.stage = 3;
    this.flows.delete(requesterId);
    return { status: 'ready', flow, retract };
  }

  cancel(requesterId: RequesterId): PendingPostFlow | undefined {
    const flow = this.flows.get(requesterId);
    this.flows.delete(requesterId);
    return flow;
  }

  /** Drops flows idle for at least `ttlMs` and returns them */
  expireStale(ttlMs: number): PendingPostFlow[] {
    const cutoff = this.now() - ttlMs;
    const expired: PendingPostFlow[] = [];
    for (const [requesterId, flow] of this.flows) {
      if (flow.updatedAt <= cutoff) {
        expired.push(flow);
        this.flows.delete(requesterId);
      }
    }
    return expired;
  }
}
