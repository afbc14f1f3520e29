export type Datatype = "anat" | "func" | "fmap";

export interface SourceFile {
  readonly path: string;
  readonly filename: string;
  readonly relativePath: string;
  readonly datatype: string;
  readonly entities: Readonly<Record<string, string>>;
}

export interface FileQuery {
  subject: string;
  session: string;
  datatype: Datatype;
  suffix?: string;
  task?: string;
  extension: string;
}
