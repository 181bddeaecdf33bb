export interface TargetFlags {
  published: boolean;
  inPrep: boolean;
  obsComplete: boolean;
}

export interface TargetRecord extends TargetFlags {
  planetName: string;
  /** Only read by the flag-based grouping. */
  future: boolean;
}
