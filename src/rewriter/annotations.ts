import { AUDIT_MARKER } from '../segmenter/lines.js';

export type AnnotationKind = 'new-record' | 'needs-translation' | 'not-in-reference' | 'differences';

export interface Annotation {
  kind: AnnotationKind;
  key: string;
  /** Untranslated field count, for `needs-translation`. */
  count?: number;
}

export function annotationText(annotation: Annotation): string {
  const { key } = annotation;
  switch (annotation.kind) {
    case 'new-record':
      return `NEW RULE '${key}' THAT NEEDS TRANSLATION`;
    case 'needs-translation':
      return `RULE '${key}' NEEDS TRANSLATION OF ${annotation.count ?? 0} KEYS`;
    case 'not-in-reference':
      return `RULE '${key}' NOT IN ENGLISH FILE`;
    case 'differences':
      return `RULE '${key}' HAS DIFFERENCES OTHER THAN TRANSLATION`;
  }
}

/**
 * One full comment line, recognised and dropped by the next audit run.
 */
export function formatAnnotation(annotation: Annotation, indentation: number, eol: string): string {
  return `${' '.repeat(indentation)}# ${AUDIT_MARKER} ${annotationText(annotation)}${eol}`;
}
