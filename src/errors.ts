export type FicpackErrorCode =
  | "InvalidReference"
  | "AlreadyExists"
  | "MalformedSource"
  | "MissingMetadata"
  | "CollaboratorFailure"
  | "NotAProject"
  | "CyclicSubproject"
  | "DirectoryNotEmpty"
  | "InvalidProjectFile"
  | "Io"
  | "Usage";

export class FicpackError extends Error {
  public readonly code: FicpackErrorCode;
  public readonly exitCode: number;

  constructor(message: string, code: FicpackErrorCode, exitCode = 1) {
    super(message);
    this.name = "FicpackError";
    this.code = code;
    this.exitCode = exitCode;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
