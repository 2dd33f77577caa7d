/**
 * Install pipeline types shared across packages
 */

/**
 * Stage of an install run
 */
export type InstallStage =
  | 'pending'
  | 'acquiring'
  | 'configuring'
  | 'building'
  | 'installing'
  | 'probing'
  | 'complete'
  | 'failed';

/**
 * Stages that run external tools and carry a timeout
 */
export type TimedStage = 'acquiring' | 'configuring' | 'building' | 'installing' | 'probing';

/**
 * Host family the command sequence is generated for
 */
export type HostPlatform = 'windows' | 'unix';

/**
 * Which install route a plan takes
 * - binding: install the language binding directly from its subdirectory
 * - generator: configure with the build-system generator, then build and install
 */
export type InstallRoute = 'binding' | 'generator';

/**
 * Outcome of comparing package snapshots taken before and after a run
 */
export type ProbeVerdict = 'fresh' | 'unchanged' | 'missing';
