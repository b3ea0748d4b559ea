import type { SourceDocument, SourceKind } from "../types/records";

export interface DocumentSource {
  readonly kind: SourceKind;
  readonly label: string;
  documents(): AsyncIterable<SourceDocument>;
}
