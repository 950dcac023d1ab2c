/** Opaque reference to a folder in the remote store */
export interface FolderHandle {
  id: string;
  name: string;
}

/** Uploaded file as reported by the remote store */
export interface StoredFile {
  id: string;
  name: string;
  size: number;
}

/** Rendered certificate, kept in memory until uploaded */
export interface CertificateArtifact {
  fileName: string;
  pdf: Buffer;
  docx: Buffer;
}
