export type BodyKind = 'none' | 'form' | 'raw';

export type FormFieldKind = 'text' | 'file';

export type FormField = {
  key: string;
  value: string;
  kind: FormFieldKind;
};

export type RequestBody =
  | { kind: 'none' }
  | { kind: 'form'; fields: FormField[] }
  | { kind: 'raw'; content: string };

export type RequestSpec = {
  method: string;
  path: string;
  body?: RequestBody;
};

export type FormSummary = {
  fields: number;
  files: number;
  /** One line per row for the debug dump: `key=value`, or `key=@name (N bytes)` for files. */
  parts: string[];
};

export type PreparedRequest = {
  method: string;
  url: string;
  headers: Record<string, string>;
  bodyKind: BodyKind;
  body?: string | Uint8Array;
  formSummary?: FormSummary;
};

export type CapturedResponse = Readonly<{
  status: number;
  body: string;
  headers: Headers;
}>;
