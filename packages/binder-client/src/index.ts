export { BinderClient, BinderApiError } from './binder-client.js';
export type {
  BinderClientConfig,
  CompileParams,
  CompileResult,
  CompiledStorage,
  CompilationEntry,
  IdStrategy,
} from './binder-client.js';
