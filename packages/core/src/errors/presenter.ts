/**
 * ErrorPresenter - pure presentation layer for PicklesmithError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type { PicklesmithError, SerializedError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  setting?: string;
  excerpt?: string;
  workaround?: string;
  cause?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: PicklesmithError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      setting: error.context?.setting,
      excerpt: error.context?.valueExcerpt ?? this.#excerpt(error),
      workaround: this.#formatWorkaround(error),
      cause: error.cause?.message,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  formatForProduction(error: PicklesmithError): SerializedError {
    return error.toJSON('prod');
  }

  #excerpt(error: PicklesmithError): string | undefined {
    const value = error.context?.value;
    if (value === undefined) return undefined;
    const text =
      typeof value === 'string' || typeof value === 'bigint'
        ? String(value)
        : (JSON.stringify(value) ?? String(value));
    return text.length > 60 ? `${text.slice(0, 57)}...` : text;
  }

  #formatWorkaround(error: PicklesmithError): string | undefined {
    if (Array.isArray(error.suggestions) && error.suggestions.length > 0) {
      return error.suggestions[0];
    }
    return error.context?.suggestion;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}

export default ErrorPresenter;
