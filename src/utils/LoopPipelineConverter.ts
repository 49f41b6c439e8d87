import {
  ConversionDecision,
  ConversionReport,
  EditAction,
  LoopDecisionSummary,
  NotConvertibleReason,
  RewriteEdit,
  ScopeInfo
} from '../types/analysis';
import { LoopModel } from '../types/model';
import { ConverterOptions, resolveConverterOptions, TargetFormat } from '../types/options';
import { MethodSource, pathKey, Statement, StatementPath } from '../types/syntax';
import { ConvertibilityAnalyzer } from './analyzers/ConvertibilityAnalyzer';
import { LoopScopeScanner } from './analyzers/LoopScopeScanner';
import { LoopCandidateReader } from './extraction/LoopCandidateReader';
import { EnhancedForRenderer } from './generators/EnhancedForRenderer';
import { IteratorLoopRenderer, LoopRendering } from './generators/IteratorLoopRenderer';
import { PipelineAssembler } from './generators/PipelineAssembler';
import { PipelineToLoopConverter } from './generators/PipelineToLoopConverter';
import { StreamConcatGenerator } from './generators/StreamConcatGenerator';
import { Logger } from './Logger';
import { LoopConversionException } from './LoopConversionException';
import { PipelineReader } from './readers/PipelineReader';
import { SyntaxPrinter } from './syntax/SyntaxPrinter';
import { declaredNames } from './syntax/SyntaxQueries';
import { TypeEnvironment } from './syntax/TypeEnvironment';
import { ConsecutiveLoopGroupDetector } from './tree/ConsecutiveLoopGroupDetector';
import { LoopTree, LoopTreeNode } from './tree/LoopTree';

interface GroupedLoop {
  groupId: number;
  model: LoopModel;
}

/**
 * Converts the loops of one method. Construct once per option set and call
 * `convert` for every method; no state is kept between calls.
 */
export class LoopPipelineConverter {
  private readonly options: ConverterOptions;

  constructor(options: Partial<ConverterOptions> = {}) {
    this.options = resolveConverterOptions(options);
  }

  convert(method: MethodSource): ConversionReport {
    Logger.info('LoopPipelineConverter', `Converting method ${method.name}`, { targetFormat: this.options.targetFormat });
    const report = new MethodConversion(method, this.options).run();
    Logger.info('LoopPipelineConverter', `Finished method ${method.name}`, {
      loops: report.decisions.length,
      edits: report.edits.length
    });
    return report;
  }
}

/** State of a single traversal: the loop tree, pending edits and symbols. */
class MethodConversion {
  private readonly environment: TypeEnvironment;
  private readonly tree = new LoopTree();
  private readonly rootScope: ScopeInfo;
  private readonly analyzer: ConvertibilityAnalyzer;
  private readonly assembler: PipelineAssembler;
  private readonly groupDetector: ConsecutiveLoopGroupDetector;
  private readonly concatGenerator: StreamConcatGenerator;
  private readonly pipelineReader: PipelineReader;
  private readonly pipelineConverter: PipelineToLoopConverter;
  private readonly reservedNames: Set<string>;
  private readonly grouped = new Map<string, GroupedLoop>();
  private readonly edits: RewriteEdit[] = [];
  private readonly symbols = new Set<string>();

  constructor(private readonly method: MethodSource, private readonly options: ConverterOptions) {
    this.environment = new TypeEnvironment(method);
    this.rootScope = LoopScopeScanner.scanMethod(method);
    this.analyzer = new ConvertibilityAnalyzer(this.environment, options);
    this.assembler = new PipelineAssembler(options);
    this.groupDetector = new ConsecutiveLoopGroupDetector(this.analyzer);
    this.concatGenerator = new StreamConcatGenerator(this.assembler);
    this.pipelineReader = new PipelineReader(this.environment);
    this.pipelineConverter = new PipelineToLoopConverter(options);
    this.reservedNames = declaredNames(method.body.statements, { enterLambdas: true });
    (method.parameters ?? []).forEach(parameter => this.reservedNames.add(parameter.name));
    (method.fields ?? []).forEach(fieldBinding => this.reservedNames.add(fieldBinding.name));
  }

  run(): ConversionReport {
    this.walkList(this.method.body.statements, []);
    return {
      methodName: this.method.name,
      edits: this.edits,
      requiredSymbols: [...this.symbols].sort(),
      decisions: this.tree.all().map(node => summarize(node))
    };
  }

  private get streamTarget(): boolean {
    return this.options.targetFormat === TargetFormat.STREAM;
  }

  private walkList(statements: readonly Statement[], listPath: StatementPath): void {
    if (this.streamTarget && this.options.groupConsecutiveLoops) {
      this.detectGroups(statements, listPath);
    }
    statements.forEach((statement, index) => this.walkStatement(statement, [...listPath, index], statements, index));
  }

  private detectGroups(statements: readonly Statement[], listPath: StatementPath): void {
    const enclosing = [...this.tree.openLoops().map(node => node.scope), this.rootScope];
    for (const group of this.groupDetector.detect(statements, listPath, enclosing)) {
      try {
        const rewrite = this.concatGenerator.generate(group);
        this.edits.push(...rewrite.edits);
        rewrite.requiredSymbols.forEach(symbol => this.symbols.add(symbol));
        group.members.forEach(member => this.grouped.set(pathKey(member.candidate.path), { groupId: group.id, model: member.model }));
      } catch (error) {
        Logger.error('LoopPipelineConverter', `Loop group ${group.id} falls back to single loops`, error);
      }
    }
  }

  private walkStatement(statement: Statement, path: StatementPath, siblings?: readonly Statement[], index?: number): void {
    const site = siblings !== undefined && index !== undefined ? { statement, path, siblings, index } : { statement, path };
    const candidate = LoopCandidateReader.read(site);
    if (candidate) {
      const node = this.tree.pushLoop(candidate, LoopScopeScanner.scanLoop(candidate));
      const loop = statement.kind === 'labeled' ? statement.body : statement;
      this.walkChildren(loop, candidate.loopPath);
      this.tree.popLoop();
      this.decide(node);
      return;
    }
    if (!this.streamTarget && this.rewritePipeline(statement, path)) {
      return;
    }
    this.walkChildren(statement, path);
  }

  private walkChildren(statement: Statement, path: StatementPath): void {
    switch (statement.kind) {
      case 'block':
        this.walkList(statement.statements, path);
        return;
      case 'if':
        this.walkSlot(statement.thenStatement, [...path, 'then']);
        if (statement.elseStatement) this.walkSlot(statement.elseStatement, [...path, 'else']);
        return;
      case 'forEach':
      case 'for':
      case 'while':
      case 'doWhile':
      case 'labeled':
        this.walkSlot(statement.body, [...path, 'body']);
        return;
      case 'try':
        this.walkList(statement.block.statements, [...path, 'try']);
        statement.catches.forEach((clause, index) => this.walkList(clause.body.statements, [...path, `catch:${index}`]));
        if (statement.finallyBlock) this.walkList(statement.finallyBlock.statements, [...path, 'finally']);
        return;
      case 'switch':
        statement.cases.forEach((switchCase, index) => this.walkList(switchCase.statements, [...path, `case:${index}`]));
        return;
      case 'synchronized':
        this.walkList(statement.body.statements, [...path, 'body']);
        return;
      default:
        return;
    }
  }

  private walkSlot(statement: Statement, slotPath: StatementPath): void {
    if (statement.kind === 'block') {
      this.walkList(statement.statements, slotPath);
    } else {
      this.walkStatement(statement, slotPath);
    }
  }

  private decide(node: LoopTreeNode): void {
    try {
      this.decideNode(node);
    } catch (error) {
      Logger.error('LoopPipelineConverter', `Failed to convert loop at ${pathKey(node.candidate.path)}`, error);
      node.decision = ConversionDecision.NOT_CONVERTIBLE;
      node.reason = error instanceof LoopConversionException ? error.reason : NotConvertibleReason.INTERNAL_ERROR;
      node.detail = error instanceof Error ? error.message : String(error);
    }
    Logger.debug('LoopPipelineConverter', `Loop at ${pathKey(node.candidate.path)}: ${node.decision}`, node.reason);
  }

  private decideNode(node: LoopTreeNode): void {
    if (node.containsRewrite || this.tree.hasConvertibleDescendant(node)) {
      node.decision = ConversionDecision.SKIPPED_INNER_CONVERTED;
      return;
    }

    const grouped = this.grouped.get(pathKey(node.candidate.path));
    if (grouped) {
      node.decision = ConversionDecision.CONVERTIBLE;
      node.groupId = grouped.groupId;
      node.model = grouped.model;
      return;
    }

    if (this.streamTarget) {
      this.convertToPipeline(node);
    } else {
      this.convertLoopFormat(node);
    }
  }

  private convertToPipeline(node: LoopTreeNode): void {
    const { candidate } = node;
    const enclosing = [...this.tree.ancestorsOf(node).map(ancestor => ancestor.scope), this.rootScope];
    const verdict = this.analyzer.decide(candidate, enclosing);
    if (verdict.decision !== ConversionDecision.CONVERTIBLE) {
      this.reject(node, verdict.reason, verdict.detail);
      return;
    }

    const assembly = this.assembler.assemble(verdict.model, candidate.precedingStatement);
    if (!assembly.ok) {
      this.reject(node, assembly.reason, assembly.detail);
      return;
    }

    node.decision = ConversionDecision.CONVERTIBLE;
    node.model = verdict.model;
    this.edits.push({ action: EditAction.REPLACE, path: candidate.path, statements: assembly.statements, code: assembly.code });
    candidate.removedPaths.forEach(removed => this.edits.push({ action: EditAction.REMOVE, path: removed }));
    if (assembly.mergedDeclaration && candidate.precedingPath) {
      this.edits.push({ action: EditAction.REMOVE, path: candidate.precedingPath });
    }
    assembly.requiredSymbols.forEach(symbol => this.symbols.add(symbol));
  }

  private convertLoopFormat(node: LoopTreeNode): void {
    const { candidate } = node;
    const verdict = this.analyzer.decideFormatChange(candidate);
    if (verdict.decision !== ConversionDecision.CONVERTIBLE) {
      this.reject(node, verdict.reason, verdict.detail);
      return;
    }

    const { label } = candidate;
    const rendering: LoopRendering = this.options.targetFormat === TargetFormat.ITERATOR_WHILE
      ? IteratorLoopRenderer.render(verdict.model, {
          label,
          iteratorVariableName: this.options.iteratorVariableName,
          reservedNames: this.reservedNames
        })
      : EnhancedForRenderer.render(verdict.model, { label });

    node.decision = ConversionDecision.CONVERTIBLE;
    node.model = verdict.model;
    this.pushRendering(candidate.path, rendering);
    candidate.removedPaths.forEach(removed => this.edits.push({ action: EditAction.REMOVE, path: removed }));
  }

  /** Inverse targets: a pipeline statement outside any convertible loop becomes a loop. */
  private rewritePipeline(statement: Statement, path: StatementPath): boolean {
    const reading = this.pipelineReader.read(statement);
    if (!reading) return false;
    try {
      const rendering = this.pipelineConverter.convert(reading, this.reservedNames);
      this.pushRendering(path, rendering);
      this.tree.markRewriteInside();
      Logger.debug('LoopPipelineConverter', `Pipeline at ${pathKey(path)} rewritten as a loop`);
      return true;
    } catch (error) {
      Logger.error('LoopPipelineConverter', `Pipeline at ${pathKey(path)} left unchanged`, error);
      return false;
    }
  }

  private pushRendering(path: StatementPath, rendering: LoopRendering): void {
    this.edits.push({
      action: EditAction.REPLACE,
      path,
      statements: rendering.statements,
      code: SyntaxPrinter.printStatements(rendering.statements)
    });
    rendering.requiredSymbols.forEach(symbol => this.symbols.add(symbol));
  }

  private reject(node: LoopTreeNode, reason: NotConvertibleReason, detail: string | undefined): void {
    node.decision = ConversionDecision.NOT_CONVERTIBLE;
    node.reason = reason;
    if (detail !== undefined) node.detail = detail;
  }
}

function summarize(node: LoopTreeNode): LoopDecisionSummary {
  const summary: LoopDecisionSummary = {
    path: node.candidate.path,
    kind: node.candidate.kind,
    decision: node.decision
  };
  if (node.reason !== undefined) summary.reason = node.reason;
  if (node.detail !== undefined) summary.detail = node.detail;
  if (node.groupId !== undefined) summary.groupId = node.groupId;
  if (node.model !== undefined && node.decision === ConversionDecision.CONVERTIBLE) summary.model = node.model;
  return summary;
}
