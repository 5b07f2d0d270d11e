// =============================================================================
// CoBridge - Host
// =============================================================================

export { VirtualHost, pinError, busError } from './virtual-host'
export type { VirtualHostMode, VirtualHostOptions, VirtualHostStats } from './virtual-host'
export { HeartbeatDriver } from './heartbeat'
export type { HeartbeatDriverOptions } from './heartbeat'
