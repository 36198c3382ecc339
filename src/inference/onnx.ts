// Инференс через ONNX Runtime: одна сессия на вызов, освобождение в finally.
import { readFile } from 'node:fs/promises';
import { InferenceSession, Tensor } from 'onnxruntime-web';
import { EmbeddingError, InferenceError, TensorShapeError, errorMessage } from '../errors.js';
import { sameShape } from '../tensors/assembler.js';
import type { AssembledInputs, Float32TensorBuffer, Int64TensorBuffer } from '../tensors/assembler.js';
import type { InferencePort } from './types.js';

// Имена входов и выхода экспортированных BERT-моделей.
export const INPUT_IDS = 'input_ids';
export const ATTENTION_MASK = 'attention_mask';
export const TOKEN_TYPE_IDS = 'token_type_ids';
export const LAST_HIDDEN_STATE = 'last_hidden_state';

// Минимальная часть сессии, которой пользуется адаптер.
export type SessionHandle = Pick<InferenceSession, 'inputNames' | 'run' | 'release'>;

export type SessionFactory = (
  model: Uint8Array,
  options: InferenceSession.SessionOptions,
) => Promise<SessionHandle>;

export interface OnnxInferenceOptions {
  modelPath: string;
  executionProviders?: readonly string[];
  createSession?: SessionFactory;
}

const defaultSessionFactory: SessionFactory = (model, options) =>
  InferenceSession.create(model, options);

function toTensor(buffer: Int64TensorBuffer): Tensor {
  return new Tensor('int64', buffer.data, buffer.shape);
}

// Сбой освобождения пробрасывается, только если прогон прошёл успешно:
// ошибка прогона важнее.
async function releaseSession(session: SessionHandle, runFailed: boolean): Promise<void> {
  try {
    await session.release();
  } catch (error) {
    if (runFailed) {
      return;
    }
    throw new InferenceError(`Failed to release inference session: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

export class OnnxInference implements InferencePort {
  private readonly modelPath: string;
  private readonly executionProviders: readonly string[];
  private readonly createSession: SessionFactory;
  private modelBytes: Promise<Uint8Array> | null = null;

  constructor(options: OnnxInferenceOptions) {
    this.modelPath = options.modelPath;
    this.executionProviders = options.executionProviders ?? [];
    this.createSession = options.createSession ?? defaultSessionFactory;
  }

  async infer(inputs: AssembledInputs): Promise<Float32TensorBuffer> {
    const { inputIds, attentionMask, tokenTypeIds } = inputs;
    if (
      inputIds.shape.length !== 2 ||
      !sameShape(inputIds.shape, attentionMask.shape) ||
      !sameShape(inputIds.shape, tokenTypeIds.shape)
    ) {
      throw new TensorShapeError(
        `Input tensors must share shape [batch, maxLength]: ids=[${inputIds.shape.join(', ')}], ` +
        `mask=[${attentionMask.shape.join(', ')}], typeIds=[${tokenTypeIds.shape.join(', ')}]`,
      );
    }

    const model = await this.loadModel();
    const tensors: Tensor[] = [];
    let session: SessionHandle | undefined;
    let runFailed = false;

    try {
      const idsTensor = toTensor(inputIds);
      const maskTensor = toTensor(attentionMask);
      const typeTensor = toTensor(tokenTypeIds);
      tensors.push(idsTensor, maskTensor, typeTensor);

      session = await this.createSession(model, this.sessionOptions());

      const feeds: Record<string, Tensor> = {
        [INPUT_IDS]: idsTensor,
        [ATTENTION_MASK]: maskTensor,
      };
      // Часть моделей не принимает token_type_ids.
      if (session.inputNames.includes(TOKEN_TYPE_IDS)) {
        feeds[TOKEN_TYPE_IDS] = typeTensor;
      }

      const outputs = await session.run(feeds);
      const hidden = outputs[LAST_HIDDEN_STATE];
      if (!hidden) {
        throw new InferenceError(`Model produced no "${LAST_HIDDEN_STATE}" output`);
      }
      tensors.push(hidden);

      if (!(hidden.data instanceof Float32Array)) {
        throw new InferenceError(`Expected float32 "${LAST_HIDDEN_STATE}", got ${hidden.type}`);
      }

      const shape = [...hidden.dims];
      if (shape.length !== 3 || shape[0] !== inputIds.shape[0]) {
        throw new TensorShapeError(
          `Output shape [${shape.join(', ')}] does not match batch size ${inputIds.shape[0]}`,
        );
      }

      // Копия — буфер выхода освобождается вместе с тензором.
      return { data: Float32Array.from(hidden.data), shape };
    } catch (error) {
      runFailed = true;
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new InferenceError(`Inference failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      for (const tensor of tensors) {
        tensor.dispose();
      }
      if (session) {
        await releaseSession(session, runFailed);
      }
    }
  }

  // Отпускает закэшированные байты модели.
  release(): void {
    this.modelBytes = null;
  }

  private sessionOptions(): InferenceSession.SessionOptions {
    if (this.executionProviders.length === 0) {
      return {};
    }
    return { executionProviders: [...this.executionProviders] };
  }

  // Веса читаются один раз и дальше общие для всех батчей.
  private async loadModel(): Promise<Uint8Array> {
    if (!this.modelBytes) {
      this.modelBytes = this.readModel();
    }
    try {
      return await this.modelBytes;
    } catch (error) {
      // Неудачное чтение не кэшируем.
      this.modelBytes = null;
      throw error;
    }
  }

  private async readModel(): Promise<Uint8Array> {
    try {
      const buffer = await readFile(this.modelPath);
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (error) {
      throw new InferenceError(
        `Cannot read model weights ${this.modelPath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
