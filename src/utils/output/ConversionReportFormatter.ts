import Handlebars from 'handlebars';
import { ConversionDecision, ConversionReport, EditAction, LoopDecisionSummary, RewriteEdit } from '../../types/analysis';
import { pathKey, StatementPath } from '../../types/syntax';

const REPORT_TEMPLATE = [
  'Method: {{methodName}}',
  'Loops: {{loopCount}} ({{convertibleCount}} convertible)',
  '{{#each decisions}}',
  '  • {{this}}',
  '{{/each}}',
  '{{#if edits.length}}',
  'Edits:',
  '{{#each edits}}',
  '  {{this.heading}}',
  '{{#if this.code}}',
  '{{this.code}}',
  '{{/if}}',
  '{{/each}}',
  '{{else}}',
  'No edits.',
  '{{/if}}',
  '{{#if requiredSymbols.length}}',
  'Required symbols:',
  '{{#each requiredSymbols}}',
  '  • {{this}}',
  '{{/each}}',
  '{{/if}}'
].join('\n');

interface EditView {
  heading: string;
  code?: string;
}

interface ReportView {
  methodName: string;
  loopCount: number;
  convertibleCount: number;
  decisions: string[];
  edits: EditView[];
  requiredSymbols: string[];
}

export class ConversionReportFormatter {
  private readonly template: Handlebars.TemplateDelegate<ReportView>;

  constructor() {
    this.template = Handlebars.create().compile<ReportView>(REPORT_TEMPLATE, { noEscape: true });
  }

  format(report: ConversionReport): string {
    return this.template({
      methodName: report.methodName,
      loopCount: report.decisions.length,
      convertibleCount: report.decisions.filter(decision => decision.decision === ConversionDecision.CONVERTIBLE).length,
      decisions: report.decisions.map(decision => formatDecision(decision)),
      edits: report.edits.map(edit => formatEdit(edit)),
      requiredSymbols: report.requiredSymbols
    }).trimEnd();
  }
}

export function formatPath(path: StatementPath): string {
  return path.length === 0 ? '(body)' : pathKey(path);
}

function formatDecision(summary: LoopDecisionSummary): string {
  let line = `${formatPath(summary.path)} ${summary.kind}: ${summary.decision}`;
  if (summary.reason) {
    line += summary.detail ? ` (${summary.reason}: ${summary.detail})` : ` (${summary.reason})`;
  }
  if (summary.groupId !== undefined) {
    line += ` [group ${summary.groupId}]`;
  }
  return line;
}

function formatEdit(edit: RewriteEdit): EditView {
  if (edit.action === EditAction.REMOVE) {
    return { heading: `REMOVE ${formatPath(edit.path)}` };
  }
  return {
    heading: `REPLACE ${formatPath(edit.path)}`,
    code: edit.code.split('\n').map(line => `    ${line}`).join('\n')
  };
}
