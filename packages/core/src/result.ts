/**
 * Report accumulation
 *
 * Conversions report recoverable problems as warnings and fatal ones as
 * errors, instead of throwing across their public boundary.
 */

/**
 * What a conversion needs from whoever collects its problems
 */
export interface ReportSink {
  markFailed(): void;
  addError(message: string): void;
  addWarning(message: string): void;
}

/**
 * Value produced by a conversion together with everything it reported
 */
export interface Outcome<T> {
  value: T;
  ok: boolean;
  warnings: string[];
  errors: string[];
}

/**
 * Accumulating report for one conversion attempt.
 * Not shared between concurrent callers; create one per call site.
 */
export class Result implements ReportSink {
  private _passed = true;
  private readonly _errors: string[] = [];
  private readonly _warnings: string[] = [];

  get passed(): boolean {
    return this._passed;
  }

  get errors(): readonly string[] {
    return this._errors;
  }

  get warnings(): readonly string[] {
    return this._warnings;
  }

  markFailed(): void {
    this._passed = false;
  }

  addError(message: string): void {
    this._errors.push(message);
  }

  addWarning(message: string): void {
    this._warnings.push(message);
  }

  /**
   * Snapshot this report around a value
   */
  toOutcome<T>(value: T): Outcome<T> {
    return {
      value,
      ok: this._passed,
      warnings: [...this._warnings],
      errors: [...this._errors],
    };
  }

  toString(): string {
    const lines = [`Passed: ${this._passed}`];
    for (const error of this._errors) {
      lines.push(`Error: ${error}`);
    }
    for (const warning of this._warnings) {
      lines.push(`Warning: ${warning}`);
    }
    return lines.join('\n');
  }
}

/**
 * Run a conversion against a fresh report and return its outcome
 *
 * @example
 * const { value, ok, warnings } = collect((sink) => codec.mappingFromString(raw, sink));
 */
export function collect<T>(convert: (sink: ReportSink) => T): Outcome<T> {
  const result = new Result();
  const value = convert(result);
  return result.toOutcome(value);
}
