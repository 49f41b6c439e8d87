import Handlebars from 'handlebars';
import { LoopModel, OperationKind, PipelineOperation, Terminal, TerminalKind, UNUSED_PARAMETER_NAME } from '../../types/model';
import { SyntaxPrinter } from '../syntax/SyntaxPrinter';

const DIAGRAM_TEMPLATE = [
  '{{sourceText}} [{{sourceKind}}]',
  '  |  {{elementType}} {{elementName}}',
  '{{#each stages}}',
  '  +- {{this}}',
  '{{/each}}',
  '  => {{terminal}}'
].join('\n');

const DETAIL_TEMPLATE = [
  'Source:     {{sourceText}} ({{sourceKind}} of {{sourceElementType}})',
  'Element:    {{#if elementFinal}}final {{/if}}{{elementType}} {{elementName}}',
  'Operations:',
  '{{#each stages}}',
  '  {{ordinal @index}}. {{this}}',
  '{{else}}',
  '  none',
  '{{/each}}',
  'Terminal:   {{terminal}}',
  'Metadata:   hasBreak={{metadata.hasBreak}}, hasLabeledContinue={{metadata.hasLabeledContinue}}, modifiesSource={{metadata.modifiesSource}}'
].join('\n');

interface ModelView {
  sourceText: string;
  sourceKind: string;
  sourceElementType: string;
  elementType: string;
  elementName: string;
  elementFinal: boolean;
  stages: string[];
  terminal: string;
  metadata: LoopModel['metadata'];
}

/** Text views of a loop model for the CLI and the debug log. */
export class LoopModelFormatter {
  private readonly handlebars = Handlebars.create();
  private readonly diagram: Handlebars.TemplateDelegate<ModelView>;
  private readonly detail: Handlebars.TemplateDelegate<ModelView>;

  constructor() {
    this.handlebars.registerHelper('ordinal', (index: number) => index + 1);
    this.diagram = this.handlebars.compile<ModelView>(DIAGRAM_TEMPLATE, { noEscape: true });
    this.detail = this.handlebars.compile<ModelView>(DETAIL_TEMPLATE, { noEscape: true });
  }

  /** One line per stage, from the source down to the terminal. */
  visualize(model: LoopModel): string {
    return this.diagram(this.view(model));
  }

  describe(model: LoopModel): string {
    return this.detail(this.view(model));
  }

  private view(model: LoopModel): ModelView {
    return {
      sourceText: model.source.expressionText,
      sourceKind: model.source.kind,
      sourceElementType: model.source.elementTypeName,
      elementType: model.element.typeName,
      elementName: model.element.name,
      elementFinal: model.element.isFinal,
      stages: model.operations.map(operation => describeOperation(operation)),
      terminal: model.terminal ? describeTerminal(model.terminal) : '(none)',
      metadata: model.metadata
    };
  }
}

function describeOperation(operation: PipelineOperation): string {
  if (operation.kind === OperationKind.FILTER) {
    return `filter: ${SyntaxPrinter.printExpression(operation.predicate)}`;
  }
  const expression = SyntaxPrinter.printExpression(operation.expression);
  return operation.producedVariableName === UNUSED_PARAMETER_NAME
    ? `map: ${expression}`
    : `map: ${expression} -> ${operation.producedVariableName}`;
}

function describeTerminal(terminal: Terminal): string {
  switch (terminal.kind) {
    case TerminalKind.FOR_EACH: {
      const count = terminal.bodyStatements.length;
      return `${terminal.ordered ? 'forEachOrdered' : 'forEach'}: ${count} statement${count === 1 ? '' : 's'}`;
    }
    case TerminalKind.COLLECT:
      return `collect(${terminal.collectorKind}) -> ${terminal.targetVariableName}`;
    case TerminalKind.REDUCE:
      return `reduce(${terminal.reducerKind}) -> ${terminal.accumulatorVariableName}`;
    case TerminalKind.MATCH:
      return `match(${terminal.matchKind}): ${SyntaxPrinter.printExpression(terminal.condition)}`;
  }
}
