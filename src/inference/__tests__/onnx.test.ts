import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Tensor } from 'onnxruntime-web';
import type { InferenceSession } from 'onnxruntime-web';
import { OnnxInference } from '../onnx.js';
import type { SessionFactory, SessionHandle } from '../onnx.js';
import { assembleTensors } from '../../tensors/assembler.js';
import type { AssembledInputs } from '../../tensors/assembler.js';
import { InferenceError, TensorShapeError } from '../../errors.js';
import { buildFirstTokenModel } from '../../__tests__/model-fixture.js';

const HIDDEN_DIM = 2;

// Записывает, что сессии передали, и отвечает заданным выходом.
class FakeSessions {
  readonly models: Uint8Array[] = [];
  readonly options: InferenceSession.SessionOptions[] = [];
  readonly feeds: InferenceSession.FeedsType[] = [];
  released = 0;
  releaseError: Error | undefined;
  inputNames: readonly string[] = ['input_ids', 'attention_mask', 'token_type_ids'];
  respond: (feeds: InferenceSession.FeedsType) => InferenceSession.OnnxValueMapType = (feeds) => {
    const dims = feeds['input_ids']?.dims ?? [];
    const [batch = 0, seqLen = 0] = dims;
    const data = new Float32Array(batch * seqLen * HIDDEN_DIM).map((_, i) => i);
    return { last_hidden_state: new Tensor('float32', data, [batch, seqLen, HIDDEN_DIM]) };
  };

  readonly factory: SessionFactory = async (model, options) => {
    this.models.push(model);
    this.options.push(options);
    const session: SessionHandle = {
      inputNames: this.inputNames,
      run: async (feeds: InferenceSession.FeedsType) => {
        this.feeds.push(feeds);
        return this.respond(feeds);
      },
      release: async () => {
        this.released++;
        if (this.releaseError) {
          throw this.releaseError;
        }
      },
    };
    return session;
  };
}

function sampleInputs(): AssembledInputs {
  return assembleTensors(
    [
      { ids: [101, 5, 0], attentionMask: [1, 1, 0], typeIds: [0, 0, 0] },
      { ids: [101, 6, 7], attentionMask: [1, 1, 1], typeIds: [0, 0, 0] },
    ],
    3,
  );
}

describe('OnnxInference', () => {
  let tmpDir: string;
  let modelPath: string;
  let sessions: FakeSessions;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'embed-onnx-'));
    modelPath = join(tmpDir, 'model_optimized.onnx');
    await writeFile(modelPath, Buffer.from([1, 2, 3]));
    sessions = new FakeSessions();
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  function createInference(executionProviders?: string[]): OnnxInference {
    return new OnnxInference({ modelPath, executionProviders, createSession: sessions.factory });
  }

  it('передаёт три int64-входа и возвращает last_hidden_state', async () => {
    const hidden = await createInference().infer(sampleInputs());

    expect(hidden.shape).toEqual([2, 3, HIDDEN_DIM]);
    expect(Array.from(hidden.data)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);

    const [feeds] = sessions.feeds;
    expect(Object.keys(feeds ?? {}).sort()).toEqual(['attention_mask', 'input_ids', 'token_type_ids']);
    expect(feeds?.['input_ids']?.type).toBe('int64');
    expect(feeds?.['input_ids']?.dims).toEqual([2, 3]);
    expect(sessions.released).toBe(1);
  });

  it('передаёт байты модели из файла весов', async () => {
    await createInference().infer(sampleInputs());

    expect(Array.from(sessions.models[0] ?? [])).toEqual([1, 2, 3]);
  });

  it('читает веса один раз на несколько вызовов', async () => {
    const inference = createInference();

    await inference.infer(sampleInputs());
    await inference.infer(sampleInputs());

    expect(sessions.models).toHaveLength(2);
    expect(sessions.models[0]).toBe(sessions.models[1]);
    expect(sessions.released).toBe(2);
  });

  it('не передаёт token_type_ids, если модель их не принимает', async () => {
    sessions.inputNames = ['input_ids', 'attention_mask'];

    await createInference().infer(sampleInputs());

    expect(Object.keys(sessions.feeds[0] ?? {}).sort()).toEqual(['attention_mask', 'input_ids']);
  });

  it('передаёт executionProviders в настройки сессии', async () => {
    await createInference(['cpu']).infer(sampleInputs());
    await createInference().infer(sampleInputs());

    expect(sessions.options).toEqual([{ executionProviders: ['cpu'] }, {}]);
  });

  it('оборачивает сбой прогона в InferenceError и освобождает сессию', async () => {
    sessions.respond = () => {
      throw new Error('kernel crashed');
    };

    await expect(createInference().infer(sampleInputs())).rejects.toThrow(
      new InferenceError('Inference failed: kernel crashed'),
    );
    expect(sessions.released).toBe(1);
  });

  it('сбой освобождения сессии после успешного прогона → InferenceError', async () => {
    sessions.releaseError = new Error('release failed');

    await expect(createInference().infer(sampleInputs())).rejects.toThrow(
      new InferenceError('Failed to release inference session: release failed'),
    );
    expect(sessions.released).toBe(1);
  });

  it('сбой освобождения не подменяет ошибку прогона', async () => {
    sessions.respond = () => {
      throw new Error('kernel crashed');
    };
    sessions.releaseError = new Error('release failed');

    const error = await createInference().infer(sampleInputs()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InferenceError);
    expect(error).toMatchObject({ message: 'Inference failed: kernel crashed' });
  });

  it('нет выхода last_hidden_state → InferenceError', async () => {
    sessions.respond = () => ({});

    await expect(createInference().infer(sampleInputs())).rejects.toThrow(
      'Model produced no "last_hidden_state" output',
    );
    expect(sessions.released).toBe(1);
  });

  it('выход не третьего ранга → TensorShapeError', async () => {
    sessions.respond = () => ({
      last_hidden_state: new Tensor('float32', new Float32Array(4), [2, 2]),
    });

    await expect(createInference().infer(sampleInputs())).rejects.toBeInstanceOf(TensorShapeError);
    expect(sessions.released).toBe(1);
  });

  it('входы разной формы → TensorShapeError без создания сессии', async () => {
    const inputs = sampleInputs();
    const mismatched: AssembledInputs = {
      ...inputs,
      attentionMask: { data: new BigInt64Array(4), shape: [2, 2] },
    };

    await expect(createInference().infer(mismatched)).rejects.toBeInstanceOf(TensorShapeError);
    expect(sessions.models).toHaveLength(0);
  });

  it('нет файла весов → InferenceError', async () => {
    const inference = new OnnxInference({
      modelPath: join(tmpDir, 'missing.onnx'),
      createSession: sessions.factory,
    });

    await expect(inference.infer(sampleInputs())).rejects.toThrow(/^Cannot read model weights/);
    expect(sessions.models).toHaveLength(0);
  });
});

describe('OnnxInference с настоящей сессией', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'embed-onnx-real-'));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('прогоняет граф без token_type_ids', async () => {
    const modelPath = join(tmpDir, 'model_optimized.onnx');
    await writeFile(modelPath, buildFirstTokenModel());
    const inference = new OnnxInference({ modelPath });

    // Граф возвращает id каждой позиции как скрытое состояние размерности 1.
    const hidden = await inference.infer(sampleInputs());

    expect(hidden.shape).toEqual([2, 3, 1]);
    expect(Array.from(hidden.data)).toEqual([101, 5, 0, 101, 6, 7]);
  });
});
