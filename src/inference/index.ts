// Barrel-файл модуля инференса.
export type { InferencePort } from './types.js';
export type { RuntimeSettings, RuntimeInitOptions } from './environment.js';
export type { OnnxInferenceOptions, SessionFactory, SessionHandle } from './onnx.js';

export { RuntimeEnvironment, runtimeEnvironment } from './environment.js';
export {
  OnnxInference,
  INPUT_IDS,
  ATTENTION_MASK,
  TOKEN_TYPE_IDS,
  LAST_HIDDEN_STATE,
} from './onnx.js';
