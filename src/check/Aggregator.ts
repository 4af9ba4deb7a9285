import { Severity, severityName } from './Severity.js';

/**
 * One contribution to the check result. Every part is optional; empty
 * strings are skipped like absent ones.
 */
export interface Finding {
  severity?: Severity;
  short?: string;
  long?: string;
  perfdata?: string;
}

export interface CheckResult {
  status: Severity;
  output: string;
}

/**
 * Folds findings into the worst severity seen plus ordered lists of summary
 * texts, detail lines and perfdata tokens.
 *
 * `finish()` is the single terminal point: it may be called once, after which
 * the aggregator rejects further findings.
 */
export class Aggregator {
  private worst: Severity = Severity.OK;
  private readonly shorts: string[] = [];
  private readonly longs: string[] = [];
  private readonly perfdata: string[] = [];
  private result?: CheckResult;

  constructor(private readonly prefix = 'Proxmox') {}

  emit(finding: Finding): void {
    if (this.result) {
      throw new Error('Cannot emit findings after the check has finished');
    }

    if (finding.severity !== undefined && finding.severity > this.worst) {
      this.worst = finding.severity;
    }
    if (finding.short) this.shorts.push(finding.short);
    if (finding.long) this.longs.push(finding.long);
    if (finding.perfdata) this.perfdata.push(finding.perfdata);
  }

  finish(finding: Finding = {}): CheckResult {
    if (this.result) {
      throw new Error('Check has already finished');
    }
    this.emit(finding);
    this.result = { status: this.worst, output: this.render() };
    return this.result;
  }

  get status(): Severity {
    return this.worst;
  }

  get finished(): boolean {
    return this.result !== undefined;
  }

  /**
   * `<prefix> <LEVEL>: <short>. <short> |<perf> <perf>` followed by one line
   * per detail message.
   */
  render(): string {
    const summary =
      `${this.prefix} ${severityName(this.worst)}: ` +
      `${this.shorts.join('. ')} |${this.perfdata.join(' ')}\n`;
    return summary + this.longs.map((line) => `${line}\n`).join('');
  }
}
