/**
 * Obligation resolution, constructor selection, rendering and output.
 *
 * @packageDocumentation
 */

export { resolveObligations } from './resolver.js';
export type {
  MethodObligation,
  ObligationResolution,
  ResolutionWarning,
  ResolutionWarningCode,
} from './resolver.js';

export { selectConstructor } from './constructor-selector.js';
export type { ConstructorChoice } from './constructor-selector.js';

export {
  DEFAULT_CLASS_SUFFIX,
  DEFAULT_INDENT,
  defaultValueFor,
  encodeAscii,
  implementationClassName,
  isJavaIdentifier,
  parameterNames,
  renderSource,
} from './synthesizer.js';
export type { GeneratedSource, RenderOptions } from './synthesizer.js';

export { FileSystemSink, MemorySink, SOURCE_EXTENSION, sourceFilePath } from './sink.js';
export type { OutputSink } from './sink.js';

export {
  ENUM_ROOT_TYPE,
  Implementor,
  generateSource,
  validateSubject,
  validateSubjectName,
} from './implementor.js';
export type { GenerationResult, ImplementResult, ImplementorOptions } from './implementor.js';
