/**
 * Glossary Types
 *
 * @module domains/glossary/types
 */

export type GlossaryEntryStatus = 'pending' | 'uploaded' | 'discarded';

/**
 * URIs issued for one uploaded glossary file.
 * Attached to an entry as a unit.
 */
export interface IssuedGlossaryUris {
  /** Upper-cased extension without the dot, e.g. 'CSV' */
  formatCode: string;

  /** Object URL with an embedded SAS credential */
  signedUri: string;

  /** Absolute expiry of signedUri, fixed at issuance */
  signedUriExpiresOn: Date;

  /** Object URL without credential, for managed identity access */
  plainUri: string;
}

/**
 * A single glossary file tracked by the registry
 */
export interface GlossaryEntry extends Partial<IssuedGlossaryUris> {
  /** Local path, also the registry key */
  sourcePath: string;

  status: GlossaryEntryStatus;

  /** Storage key the file was uploaded under */
  objectKey?: string;

  /** Local file size counted toward the batch total */
  sizeBytes?: number;
}

/**
 * Registry state.
 * 'empty' means no glossary processing is needed.
 */
export type GlossaryRegistryState =
  | { kind: 'empty' }
  | { kind: 'populated'; entries: Map<string, GlossaryEntry> };

/**
 * Descriptor handed to the document translation request
 */
export interface TranslationGlossary {
  glossaryUrl: string;
  format: string;
}

export interface UploadResult {
  filesUploaded: number;
  totalBytes: number;
}

export const EMPTY_UPLOAD_RESULT: Readonly<UploadResult> = Object.freeze({
  filesUploaded: 0,
  totalBytes: 0,
});

/**
 * Caller-supplied observers
 */
export interface GlossaryEventHandlers {
  /** Fired once per filtering pass when any entries were removed */
  onDiscarded?: (sourcePaths: string[]) => void;

  /** Fired once per upload batch */
  onUploadComplete?: (result: UploadResult) => void;
}
