export * from './types';
export { LoopPipelineConverter } from './utils/LoopPipelineConverter';
export { LoopConversionException } from './utils/LoopConversionException';
export { Logger, LogLevel } from './utils/Logger';
export { LoopCandidateReader, StatementSite } from './utils/extraction/LoopCandidateReader';
export { LoopModelExtractor } from './utils/extraction/LoopModelExtractor';
export { ConvertibilityAnalyzer, ConvertibilityVerdict } from './utils/analyzers/ConvertibilityAnalyzer';
export { LoopScopeScanner } from './utils/analyzers/LoopScopeScanner';
export { SourceThreadSafetyAnalyzer } from './utils/analyzers/SourceThreadSafetyAnalyzer';
export { LoopTree, LoopTreeNode } from './utils/tree/LoopTree';
export { ConsecutiveLoopGroup, ConsecutiveLoopGroupDetector } from './utils/tree/ConsecutiveLoopGroupDetector';
export { AssemblyResult, PipelineAssembler } from './utils/generators/PipelineAssembler';
export { IteratorLoopRenderer, LoopRendering, LoopRenderOptions } from './utils/generators/IteratorLoopRenderer';
export { EnhancedForRenderer } from './utils/generators/EnhancedForRenderer';
export { StreamConcatGenerator } from './utils/generators/StreamConcatGenerator';
export { PipelineToLoopConverter } from './utils/generators/PipelineToLoopConverter';
export { PipelineReader, PipelineReading, PipelineWrappingKind, readPipelineStatement } from './utils/readers/PipelineReader';
export { TypeEnvironment } from './utils/syntax/TypeEnvironment';
export { SyntaxPrinter } from './utils/syntax/SyntaxPrinter';
export * as syntax from './utils/syntax/SyntaxFactory';
export { MethodSourceParser } from './utils/parsers/MethodSourceParser';
export { LoopModelFormatter } from './utils/output/LoopModelFormatter';
export { ConversionReportFormatter } from './utils/output/ConversionReportFormatter';
export { applyRewriteEdits } from './utils/output/EditApplier';
