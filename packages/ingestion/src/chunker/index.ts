export {
  Chunker,
  buildProse,
  chunkToText,
  composeFigureText,
  slideWindows,
} from './chunker';
export type {
  ChunkerOptions,
  PageChunkInput,
  Prose,
  TextWindow,
} from './chunker';
