/**
 * Subject label naming convention.
 *
 * Two uppercase letters, four digits, the literal "_v", one uppercase
 * letter or digit for the visit. Example: LD4001_v1.
 */

const SUBJECT_LABEL_RE = /^[A-Z]{2}[0-9]{4}_v[A-Z0-9]$/;

/** Pure and total. A failing label is reported, never corrected. */
export function validateSubjectLabel(label: string): boolean {
  return SUBJECT_LABEL_RE.test(label);
}

/**
 * Study prefix used to scope rename rules ("LD4001_v1" -> "LD4").
 * Only meaningful for labels that pass validateSubjectLabel.
 */
export function studyCodeOf(label: string): string {
  return label.slice(0, 3);
}
