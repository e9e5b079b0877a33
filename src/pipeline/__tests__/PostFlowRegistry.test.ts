import { describe, it, expect } from 'vitest';
import { PostFlowRegistry, parseHashtags } from '../PostFlowRegistry.js';
import { createMockArtifact } from '../../../tests/helpers/mockFactories.js';

describe('parseHashtags', () => {
  it('should split on any whitespace and drop empties', () => {
    expect(parseHashtags('  #fun   #cats\n#dogs ')).toEqual(['#fun', '#cats', '#dogs']);
    expect(parseHashtags('   ')).toEqual([]);
  });
});

describe('PostFlowRegistry', () => {
  it('should walk a flow from comment to hashtags to ready', () => {
    const registry = new PostFlowRegistry(() => 1000);
    const artifact = createMockArtifact('a');
    registry.begin('chat-1', artifact);
    registry.trackPrompt('chat-1', 'p1');

    const first = registry.acceptText('chat-1', '  Look at this ');
    expect(first.status).toBe('awaiting-hashtags');
    if (first.status !== 'awaiting-hashtags') return;
    expect(first.retract).toEqual(['p1']);
    expect(first.flow.comment).toBe('Look at this');
    expect(first.flow.stage).toBe(2);

    registry.trackPrompt('chat-1', 'p2');
    const second = registry.acceptText('chat-1', '#one #two');
    expect(second.status).toBe('ready');
    if (second.status !== 'ready') return;
    expect(second.retract).toEqual(['p2']);
    expect(second.flow).toMatchObject({
      stage: 3,
      artifact,
      comment: 'Look at this',
      hashtags: ['#one', '#two'],
    });
    expect(registry.get('chat-1')).toBeUndefined();
  });

  it('should ignore text from a requester without a flow', () => {
    const registry = new PostFlowRegistry();

    expect(registry.acceptText('chat-9', 'hello')).toEqual({ status: 'ignored' });
  });

  it('should keep flows of different requesters apart', () => {
    const registry = new PostFlowRegistry();
    registry.begin('chat-1', createMockArtifact('a'));
    registry.begin('chat-2', createMockArtifact('b'));

    registry.acceptText('chat-1', 'first');

    expect(registry.get('chat-1')?.stage).toBe(2);
    expect(registry.get('chat-2')?.stage).toBe(1);
    expect(registry.size).toBe(2);
  });

  it('should replace an existing flow when a new one begins', () => {
    const registry = new PostFlowRegistry();
    registry.begin('chat-1', createMockArtifact('a'));
    registry.acceptText('chat-1', 'old comment');

    registry.begin('chat-1', createMockArtifact('b'));

    expect(registry.get('chat-1')).toMatchObject({ stage: 1, comment: '' });
  });

  it('should expire flows idle for at least the timeout', () => {
    let now = 0;
    const registry = new PostFlowRegistry(() => now);
    registry.begin('idle', createMockArtifact('a'));
    now = 500;
    registry.begin('active', createMockArtifact('b'));

    now = 1000;
    const expired = registry.expireStale(1000);

    expect(expired.map((flow) => flow.requesterId)).toEqual(['idle']);
    expect(registry.get('idle')).toBeUndefined();
    expect(registry.get('active')).toBeDefined();
  });

  it('should refresh the idle clock on every reply', () => {
    let now = 0;
    const registry = new PostFlowRegistry(() => now);
    registry.begin('chat-1', createMockArtifact('a'));

    now = 900;
    registry.acceptText('chat-1', 'comment');
    now = 1500;

    expect(registry.expireStale(1000)).toEqual([]);
  });
});
