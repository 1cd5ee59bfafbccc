/**
 * @arch hexagraph.cli.formatter
 */
import chalk from 'chalk';
import { formatGraphSummary } from '../../core/graph/summary.js';
import type { AnalysisReport, FormatOptions, IFormatter } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'dim' | 'bold';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
    };
  }

  formatAnalysis(report: AnalysisReport): string {
    const lines: string[] = [formatGraphSummary(report.summary), ''];

    // Layer rules
    if (report.layerViolations.length === 0) {
      lines.push(`${this.colorize('✓', 'green')} Layer dependencies: no violations`);
    } else {
      lines.push(
        `${this.colorize('✗', 'red')} Layer dependencies: ${this.colorize(
          `${report.layerViolations.length} violation(s)`,
          'red'
        )}`
      );
      for (const violation of report.layerViolations) {
        lines.push(`    ${violation.from} -> ${violation.to}: ${violation.reason}`);
      }
    }

    // Ports
    if (report.unimplementedPorts.length === 0) {
      lines.push(`${this.colorize('✓', 'green')} Port implementations: all ports implemented`);
    } else {
      lines.push(
        `${this.colorize('✗', 'red')} Port implementations: ${this.colorize(
          `${report.unimplementedPorts.length} unimplemented`,
          'red'
        )}`
      );
      for (const port of report.unimplementedPorts) {
        lines.push(`    ${port}`);
      }
    }

    if (report.smells.length > 0) {
      lines.push('', this.colorize(`Smells (${report.smells.length}):`, 'yellow'));
      for (const smell of report.smells) {
        lines.push(`    ${this.colorize(`[${smell.kind}]`, 'dim')} ${smell.description}`);
      }
    }

    if (report.patterns.length > 0) {
      lines.push('', this.colorize(`Patterns (${report.patterns.length}):`, 'cyan'));
      for (const pattern of report.patterns) {
        lines.push(`    ${pattern.pattern}: ${pattern.description}`);
      }
    }

    lines.push('');
    lines.push(report.passed ? this.colorize('PASSED', 'green') : this.colorize('FAILED', 'red'));

    return lines.join('\n');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
