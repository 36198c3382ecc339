// Процессное окружение ONNX Runtime.
import { env } from 'onnxruntime-web';
import type { Env } from 'onnxruntime-web';

// Часть глобальных настроек рантайма, которую меняет окружение.
export interface RuntimeSettings {
  wasm: Pick<Env.WebAssemblyFlags, 'wasmPaths'>;
}

export interface RuntimeInitOptions {
  // Путь (префикс) к бинарникам рантайма.
  libraryPath?: string;
}

/**
 * Явный жизненный цикл глобального окружения движка.
 * initialize() идемпотентна, destroy() вызывает владелец; при импорте ничего не инициализируется.
 */
export class RuntimeEnvironment {
  private initialized = false;
  private previousPaths: Env.WebAssemblyFlags['wasmPaths'];

  constructor(private readonly settings: RuntimeSettings = env) {}

  isInitialized(): boolean {
    return this.initialized;
  }

  initialize(options: RuntimeInitOptions = {}): void {
    if (this.initialized) {
      return;
    }

    this.previousPaths = this.settings.wasm.wasmPaths;
    if (options.libraryPath) {
      this.settings.wasm.wasmPaths = options.libraryPath;
    }
    this.initialized = true;
  }

  destroy(): void {
    if (!this.initialized) {
      return;
    }

    this.settings.wasm.wasmPaths = this.previousPaths;
    this.previousPaths = undefined;
    this.initialized = false;
  }
}

// Единственный экземпляр на процесс.
export const runtimeEnvironment = new RuntimeEnvironment();
