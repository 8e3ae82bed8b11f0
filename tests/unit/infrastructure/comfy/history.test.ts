import { describe, it, expect } from 'vitest';
import { NoOutputError, NotFoundError } from '../../../../backend/domain/index.js';
import { collectArtifactRefs, selectArtifact } from '../../../../backend/infrastructure/inference/comfy/history.js';
import type { ExecutionHistory } from '../../../../backend/infrastructure/inference/comfy/http-client.js';
import { silentLogger } from '../../../../backend/services/log-manager.js';
import { recordingLogger } from '../../../helpers/fakes.js';

const history: ExecutionHistory = {
  outputs: {
    '131': { gifs: [{ fullpath: '/out/a.mp4' }, { fullpath: '/out/a_audio.mp4' }] },
    '140': { images: [{ filename: 'preview.png' }] },
    '150': { gifs: [{ fullpath: '/out/b.mp4' }] },
  },
};

describe('collectArtifactRefs()', () => {
  it('lists file references in node order', () => {
    expect(collectArtifactRefs(history)).toEqual([
      { nodeId: '131', path: '/out/a.mp4' },
      { nodeId: '131', path: '/out/a_audio.mp4' },
      { nodeId: '150', path: '/out/b.mp4' },
    ]);
  });
});

describe('selectArtifact()', () => {
  it('orders integer node ids numerically whatever order the server listed them in', async () => {
    const listed: ExecutionHistory = {
      outputs: {
        '131': { gifs: [{ fullpath: '/out/late.mp4' }] },
        '9': { gifs: [{ fullpath: '/out/early.mp4' }] },
        save: { gifs: [{ fullpath: '/out/named.mp4' }] },
      },
    };
    expect(collectArtifactRefs(listed).map((ref) => ref.nodeId)).toEqual(['9', '131', 'save']);
    await expect(selectArtifact(listed, async () => true, silentLogger)).resolves.toEqual({
      nodeId: '9',
      path: '/out/early.mp4',
      outputNodes: 3,
    });
  });

  it('takes the first existing file and reports several output nodes', async () => {
    const logger = recordingLogger();
    const selected = await selectArtifact(history, async () => true, logger);
    expect(selected).toEqual({ nodeId: '131', path: '/out/a.mp4', outputNodes: 2 });
    expect(logger.lines).toEqual([{ level: 'info', message: 'Multiple output nodes produced files; using node 131' }]);
  });

  it('skips references whose files are gone', async () => {
    const selected = await selectArtifact(history, async (p) => p === '/out/b.mp4', silentLogger);
    expect(selected).toEqual({ nodeId: '150', path: '/out/b.mp4', outputNodes: 1 });
  });

  it('raises NoOutputError when nothing was produced', async () => {
    await expect(selectArtifact({ outputs: {} }, async () => true, silentLogger)).rejects.toThrow(
      new NoOutputError('Execution finished but history contains no output artifacts')
    );
  });

  it('raises NotFoundError when no referenced file exists', async () => {
    await expect(selectArtifact(history, async () => false, silentLogger)).rejects.toThrow(
      new NotFoundError('None of 3 output artifact(s) exist on disk')
    );
  });
});
