/**
 * pscomppars column sets and closed enumerations used by the tools.
 */

export const PLANET_TABLE = 'pscomppars';

/** Identifier column, also the tie-break key of every ranked query */
export const NAME_COLUMN = 'pl_name';

export const DETAIL_COLUMNS = [
  'pl_name', 'hostname', 'pl_masse', 'pl_rade', 'pl_orbper', 'pl_orbsmax', 'pl_eqt',
  'discoverymethod', 'disc_year', 'disc_refname', 'disc_pubdate',
  'disc_locale', 'disc_facility', 'disc_telescope', 'disc_instrument',
  'sy_dist',
] as const;

export const MASSIVE_COLUMNS = ['pl_name', 'pl_masse', 'pl_orbper', 'disc_locale', 'disc_year'] as const;

export const HABITABLE_COLUMNS = [
  'pl_name', 'pl_masse', 'pl_rade', 'pl_orbper', 'pl_eqt', 'sy_dist', 'disc_year',
] as const;

export const METHOD_COLUMNS = [
  'pl_name', 'pl_masse', 'pl_rade', 'pl_orbper', 'discoverymethod', 'disc_year',
  'disc_facility', 'disc_locale',
] as const;

export const NEAREST_COLUMNS = [
  'pl_name', 'sy_dist', 'pl_masse', 'pl_rade', 'pl_orbper', 'pl_eqt', 'disc_year', 'disc_locale',
] as const;

export const SEARCH_COLUMNS = [
  'pl_name', 'hostname', 'pl_masse', 'pl_rade', 'pl_orbper', 'sy_dist', 'pl_eqt',
  'discoverymethod', 'disc_year', 'disc_locale', 'disc_facility',
] as const;

export const COMPARISON_COLUMNS = [
  'pl_name', 'pl_masse', 'pl_rade', 'pl_orbper', 'pl_eqt', 'sy_dist',
  'discoverymethod', 'disc_year', 'disc_locale',
] as const;

export const METRIC_COLUMNS = ['pl_name', 'pl_masse', 'pl_rade', 'pl_orbper', 'pl_eqt', 'sy_dist'] as const;

/**
 * Discovery methods as spelled in the archive's `discoverymethod` column.
 */
export const DISCOVERY_METHODS = [
  'Transit',
  'Radial Velocity',
  'Imaging',
  'Microlensing',
  'Astrometry',
  'Eclipse Timing Variations',
  'Transit Timing Variations',
  'Orbital Brightness Modulation',
  'Pulsar Timing',
  'Pulsation Timing Variations',
  'Disk Kinematics',
] as const;

export type DiscoveryMethod = typeof DISCOVERY_METHODS[number];

export const DISCOVERY_LOCALES = ['Ground', 'Space', 'Multiple'] as const;

export type DiscoveryLocale = typeof DISCOVERY_LOCALES[number];

/**
 * Columns advanced_search may order by.
 */
export const SORTABLE_COLUMNS = [
  'pl_name', 'pl_masse', 'pl_rade', 'pl_orbper', 'sy_dist', 'pl_eqt', 'disc_year',
] as const;

export type SortableColumn = typeof SORTABLE_COLUMNS[number];
