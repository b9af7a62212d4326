/**
 * Install orchestration
 *
 * @module core/install
 */

export { BUILD_TREE, InstallOrchestrator } from './orchestrator.js'
export type { InstallFailure, InstallOptions, InstallReport, NodeState } from './types.js'
