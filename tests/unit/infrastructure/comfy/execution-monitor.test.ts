import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ConnectTimeoutError,
  ExecutionDisconnectedError,
  ExecutionFailedError,
  ExecutionTimeoutError,
  NoOutputError,
} from '../../../../backend/domain/index.js';
import type { ChannelConnector } from '../../../../backend/infrastructure/inference/comfy/event-channel.js';
import {
  ExecutionMonitor,
  waitForCompletion,
  type ExecutionState,
} from '../../../../backend/infrastructure/inference/comfy/execution-monitor.js';
import { ScriptedChannel, executing, executionError, jsonResponse, urlOf } from '../../../helpers/fakes.js';

const history = {
  p1: {
    outputs: {
      '131': { gifs: [{ fullpath: '/comfy/output/talk_00001-audio.mp4' }] },
      '140': { gifs: [{ fullpath: '/comfy/output/preview.mp4' }] },
    },
  },
};

function stubServer(historyBody: unknown = history) {
  return vi.spyOn(globalThis, 'fetch').mockImplementation(async (input) => {
    const { pathname } = new URL(urlOf(input));
    if (pathname === '/prompt') return jsonResponse({ prompt_id: 'p1', number: 1 });
    if (pathname === '/history/p1') return jsonResponse(historyBody);
    return new Response('not found', { status: 404 });
  });
}

describe('waitForCompletion()', () => {
  it('completes once on executing/null for its own prompt and ignores everything else', async () => {
    const channel = new ScriptedChannel([
      JSON.stringify({ type: 'status', data: { status: { exec_info: { queue_remaining: 1 } } } }),
      executing(null, 'other-prompt'),
      'not json at all',
      executing('125', 'p1'),
      JSON.stringify({ type: 'progress', data: { value: 3, max: 6, prompt_id: 'p1' } }),
      executing('128', 'p1'),
      executing(null, 'p1'),
      executing(null, 'p1'),
    ]);
    const states: ExecutionState[] = [];

    await waitForCompletion(channel, 'p1', { timeoutMs: 1000, onState: (s) => states.push(s) });

    expect(states).toEqual([
      { phase: 'EXECUTING', promptId: 'p1', node: '125' },
      { phase: 'EXECUTING', promptId: 'p1', node: '128' },
      { phase: 'COMPLETE', promptId: 'p1' },
    ]);
    expect(channel.messages).toEqual([executing(null, 'p1')]);
  });

  it('accepts numeric node ids', async () => {
    const channel = new ScriptedChannel([
      JSON.stringify({ type: 'executing', data: { node: 7, prompt_id: 'p1' } }),
      executing(null, 'p1'),
    ]);
    const states: ExecutionState[] = [];
    await waitForCompletion(channel, 'p1', { timeoutMs: 1000, onState: (s) => states.push(s) });
    expect(states[0]).toEqual({ phase: 'EXECUTING', promptId: 'p1', node: '7' });
  });

  it('fails on an execution error for its prompt only', async () => {
    const channel = new ScriptedChannel([
      executionError('other-prompt', '3', 'LoadImage', 'ignored'),
      executionError('p1', '128', 'WanVideoSampler', 'Allocation on device failed'),
    ]);

    await expect(waitForCompletion(channel, 'p1', { timeoutMs: 1000 })).rejects.toThrow(
      new ExecutionFailedError('Node 128 (WanVideoSampler) failed: RuntimeError: Allocation on device failed')
    );
  });

  it('reports a closed channel as disconnected', async () => {
    const channel = new ScriptedChannel([executing('125', 'p1'), null]);
    await expect(waitForCompletion(channel, 'p1', { timeoutMs: 1000 })).rejects.toThrow(
      new ExecutionDisconnectedError('Realtime channel closed before prompt p1 completed')
    );
  });

  it('times out when completion never arrives', async () => {
    const channel = new ScriptedChannel([executing('125', 'p1')]);
    await expect(waitForCompletion(channel, 'p1', { timeoutMs: 20 })).rejects.toThrow(
      new ExecutionTimeoutError('Execution of prompt p1 exceeded 20ms')
    );
  });

  it('stops when the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort(new Error('client went away'));
    await expect(
      waitForCompletion(new ScriptedChannel([]), 'p1', { timeoutMs: 1000, signal: controller.signal })
    ).rejects.toThrow('client went away');
  });
});

describe('ExecutionMonitor', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function monitorWith(connector: ChannelConnector, exists: (p: string) => Promise<boolean> = async () => true) {
    return new ExecutionMonitor({
      server: { baseUrl: 'http://127.0.0.1:8188', requestTimeoutMs: 1000 },
      connectRetryIntervalMs: 1000,
      connectTimeoutMs: 5000,
      executionTimeoutMs: 1000,
      connector,
      sleep: async () => {},
      exists,
    });
  }

  it('subscribes before submitting and returns the first output artifact', async () => {
    const fetchSpy = stubServer();
    const channel = new ScriptedChannel([executing('125', 'p1'), executing(null, 'p1')]);
    const connectedUrls: string[] = [];
    const connector: ChannelConnector = async (url) => {
      connectedUrls.push(url);
      expect(fetchSpy).not.toHaveBeenCalled();
      return channel;
    };
    const states: ExecutionState[] = [];

    const result = await monitorWith(connector).execute({
      graph: { '1': { class_type: 'LoadImage' } },
      onState: (s) => states.push(s),
    });

    const clientId = new URL(connectedUrls[0]).searchParams.get('clientId');
    expect(result).toEqual({
      promptId: 'p1',
      clientId,
      nodeId: '131',
      artifactPath: '/comfy/output/talk_00001-audio.mp4',
    });
    const [, init] = fetchSpy.mock.calls[0];
    expect(JSON.parse(String(init?.body)).client_id).toBe(clientId);
    expect(states.map((s) => s.phase)).toEqual(['SUBMITTED', 'EXECUTING', 'COMPLETE']);
    expect(channel.closed).toBe(true);
  });

  it('uses a fresh correlation id per execution', async () => {
    stubServer();
    const urls: string[] = [];
    const connector: ChannelConnector = async (url) => {
      urls.push(url);
      return new ScriptedChannel([executing(null, 'p1')]);
    };
    const monitor = monitorWith(connector);

    await monitor.execute({ graph: {} });
    await monitor.execute({ graph: {} });

    expect(urls).toHaveLength(2);
    expect(urls[0]).not.toBe(urls[1]);
  });

  it('proceeds after refused connections below the ceiling', async () => {
    stubServer();
    let attempts = 0;
    const connector: ChannelConnector = async () => {
      attempts++;
      if (attempts <= 4) throw new Error('ECONNREFUSED');
      return new ScriptedChannel([executing(null, 'p1')]);
    };

    const result = await monitorWith(connector).execute({ graph: {} });

    expect(attempts).toBe(5);
    expect(result.promptId).toBe('p1');
  });

  it('never submits when the channel cannot be opened', async () => {
    const fetchSpy = stubServer();
    const connector: ChannelConnector = async () => {
      throw new Error('ECONNREFUSED');
    };

    await expect(monitorWith(connector).execute({ graph: {} })).rejects.toBeInstanceOf(ConnectTimeoutError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('raises NoOutputError when the prompt has no history', async () => {
    stubServer({});
    const channel = new ScriptedChannel([executing(null, 'p1')]);

    await expect(monitorWith(async () => channel).execute({ graph: {} })).rejects.toThrow(
      new NoOutputError('No execution history for prompt p1')
    );
    expect(channel.closed).toBe(true);
  });

  it('skips artifacts that no longer exist', async () => {
    stubServer();
    const result = await monitorWith(
      async () => new ScriptedChannel([executing(null, 'p1')]),
      async (p) => p === '/comfy/output/preview.mp4'
    ).execute({ graph: {} });

    expect(result.nodeId).toBe('140');
    expect(result.artifactPath).toBe('/comfy/output/preview.mp4');
  });

  it('closes the channel when execution fails', async () => {
    stubServer();
    const channel = new ScriptedChannel([executionError('p1', '128', 'WanVideoSampler', 'boom')]);

    await expect(monitorWith(async () => channel).execute({ graph: {} })).rejects.toBeInstanceOf(ExecutionFailedError);
    expect(channel.closed).toBe(true);
  });
});
