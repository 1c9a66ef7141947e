export { AnalogFileReader, withReader } from './reader';
export { AnalogFileWriter, withWriter } from './writer';
export { ContainerFormatError, ContainerIOError } from './errors';
export {
  encodeHeader,
  decodeHeader,
  decodeHeaderPrefix,
  decodeMetadata,
  encodeFrameSamples,
  decodeFrameSamples,
  frameByteLength,
} from './format';
export {
  MetadataBuilder,
  fromDocument,
  toDocument,
  metadataDocumentSchema,
  type SignalMetadata,
  type ScrambleOperations,
  type ScramblingSettings,
  type TimingCounts,
} from './metadata';
