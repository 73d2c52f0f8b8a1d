export { KnownDocumentRegistry } from './known-document-registry';
export type {
  ReserveOptions,
  ReserveOutcome,
} from './known-document-registry';
