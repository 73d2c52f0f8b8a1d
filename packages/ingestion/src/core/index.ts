export {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from './base-llm-component';
export { VisionLLMComponent } from './vision-llm-component';
export {
  DocumentStateMachine,
  type StateChangeListener,
} from './document-state-machine';
