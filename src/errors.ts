/**
 * Error types raised while assembling a deposit document.
 */

/**
 * A markup fragment (title, abstract, citation text, ...) could not be parsed
 * as well-formed XML after sanitization. Splicing it would corrupt the whole
 * document, so the assembly call fails.
 */
export class FragmentParseError extends Error {
  /** Tag the fragment was being rendered into */
  public readonly tagName: string;
  /** Sanitized and re-tagged markup that failed to parse */
  public readonly fragment: string;
  public readonly reason: string;
  public readonly line: number;
  public readonly col: number;

  constructor(tagName: string, fragment: string, reason: string, line: number, col: number) {
    super(`Could not parse <${tagName}> fragment at ${line}:${col}: ${reason}`);
    this.name = "FragmentParseError";
    this.tagName = tagName;
    this.fragment = fragment;
    this.reason = reason;
    this.line = line;
    this.col = col;
  }
}

export interface ConfigIssue {
  /** Dotted path to the offending field; empty for the whole document */
  path: string;
  message: string;
  code: string;
}

/** The deposit configuration failed validation. */
export class DepositConfigError extends Error {
  public readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[], source?: string) {
    const lines = issues.map((issue) => `  - ${issue.path || "(root)"}: ${issue.message}`);
    super([`Invalid deposit configuration${source ? ` in ${source}` : ""}:`, ...lines].join("\n"));
    this.name = "DepositConfigError";
    this.issues = issues;
  }
}
