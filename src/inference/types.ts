import type { AssembledInputs, Float32TensorBuffer } from '../tensors/assembler.js';

// Граница с движком инференса: три входа [n, L] → скрытые состояния [n, L, hiddenDim].
export interface InferencePort {
  infer(inputs: AssembledInputs): Promise<Float32TensorBuffer>;
}
