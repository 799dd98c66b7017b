export enum EntryRole {
  PRIMARY = "PRIMARY",
  PARTNER = "PARTNER",
}

export enum RepTargetKind {
  RANGE = "range",
  TO_FAILURE = "toFailure",
}

export enum PageSize {
  A4 = "A4",
  LETTER = "LETTER",
}
