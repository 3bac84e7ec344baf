export { INFERENCE_CLIENT, INFERENCE_SERVER } from './config/constants';
export {
  BackendUnavailableError,
  InferenceError,
  InferenceRequestError,
  InferenceServerError,
  ModelMismatchError,
  NetworkError,
  RequestCancelledError,
  ResourceExhaustedError,
} from './errors/inference-error';
export {
  InferenceClient,
  classifyError,
  type CompletionRequest,
  type CompletionResult,
  type InferenceClientOptions,
  type SamplingParams,
} from './inference-client';
export {
  InferenceServer,
  type InferenceServerOptions,
} from './inference-server';
