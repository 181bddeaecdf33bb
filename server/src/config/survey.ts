export const TARGET_STATUSES = ['Published', 'In prep.', 'Analysis underway', 'Collecting data'] as const;

export type TargetStatus = (typeof TARGET_STATUSES)[number];

export type ArchiveColumn =
  | 'pl_name'
  | 'disc_facility'
  | 'tic_id'
  | 'pl_radj'
  | 'pl_bmassj'
  | 'pl_eqt'
  | 'st_rad'
  | 'sy_jmag';

export const ARCHIVE_COLUMNS: readonly ArchiveColumn[] = [
  'pl_name',
  'disc_facility',
  'tic_id',
  'pl_radj',
  'pl_bmassj',
  'pl_eqt',
  'st_rad',
  'sy_jmag'
];

export const ARCHIVE_TABLE = 'pscomppars';
export const ARCHIVE_CONDITION = 'tran_flag=1';

export interface CategoryStyle {
  status: TargetStatus;
  color: string;
}

export interface AxisConfig {
  label: string;
  limits: readonly [number, number];
}

export interface SurveyConfig {
  title: string;
  // Ordered: legend order and color assignment follow this list.
  categories: readonly CategoryStyle[];
  x: AxisConfig;
  y: AxisConfig;
  background: { color: string; size: number };
  foreground: { size: number; stroke: string };
}

export const DEFAULT_SURVEY_CONFIG: SurveyConfig = {
  title: 'Survey targets',
  categories: [
    { status: 'Published', color: '#009E73' },
    { status: 'In prep.', color: '#0072B2' },
    { status: 'Analysis underway', color: '#E69F00' },
    { status: 'Collecting data', color: 'grey' }
  ],
  x: { label: 'Equilibrium temperature (K)', limits: [0, 3000] },
  y: { label: 'Planetary radius (R_J)', limits: [0, 2.2] },
  background: { color: 'darkgrey', size: 4 },
  foreground: { size: 10, stroke: 'black' }
};
