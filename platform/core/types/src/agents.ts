export interface AgentSummary {
  id: string;
  /** Display name, falling back to the agent id when the name is blank. */
  label: string;
}

export interface AgentFile {
  fileId: string;
  filename: string;
  bytes: number | null;
  /** False when the file metadata could not be resolved. */
  available: boolean;
}

export const UNAVAILABLE_FILE_LABEL = "(unavailable)";

export type UploadOutcome = "attached" | "replaced";

export interface UploadResult {
  fileId: string;
  filename: string;
  outcome: UploadOutcome;
  replacedFileId?: string;
  files: AgentFile[];
  warnings: string[];
}

export interface DeleteResult {
  fileId: string;
  files: AgentFile[];
  warnings: string[];
}

export const ALLOWED_UPLOAD_EXTENSIONS = [
  "xlsx",
  "xlsm",
  "xls",
  "csv",
  "pdf",
  "png",
  "jpg",
  "jpeg",
] as const;

export type AllowedUploadExtension = (typeof ALLOWED_UPLOAD_EXTENSIONS)[number];

export function fileExtension(filename: string): string {
  const index = filename.lastIndexOf(".");
  if (index <= 0 || index === filename.length - 1) {
    return "";
  }
  return filename.slice(index + 1).toLowerCase();
}

export function isAllowedUploadFilename(filename: string): boolean {
  const extension = fileExtension(filename);
  return (ALLOWED_UPLOAD_EXTENSIONS as readonly string[]).includes(extension);
}
