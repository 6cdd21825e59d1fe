import type { ApiContext } from '../context/api-context';

/** Anything shaped like a Cucumber `DataTable`. */
export type TableLike = {
  raw: () => string[][];
};

/** Captures arrive as strings (or numbers for `\d+`), tables as DataTables, doc strings as strings. */
export type StepArgument = string | number | TableLike;

export type StepKeyword = 'Given' | 'When' | 'Then';

export type StepDefinition = {
  keyword: StepKeyword;
  pattern: RegExp;
  arity: number;
  /** Cucumber step timeout in ms; `-1` disables it. Cucumber's default applies when unset. */
  timeout?: number;
  run: (context: ApiContext, args: StepArgument[]) => void | Promise<void>;
};

export type StepMatch = {
  definition: StepDefinition;
  captures: string[];
};
