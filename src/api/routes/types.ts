import type { TypedEventEmitter } from '../../shared/events.js';
import type { ProfileCatalog } from '../../profile/profile-catalog.js';
import type { LogChannel } from '../../runner/log-channel.js';
import type { TraversalLoop } from '../../runner/traversal-loop.js';

/** The control operations of a run, as the HTTP surface sees them. */
export type RunController = Pick<TraversalLoop, 'start' | 'pause' | 'stop' | 'openUrl' | 'configure' | 'snapshot'>;

/** Collaborators the route plugins are registered with. */
export interface ApiDependencies {
  runner: RunController;
  logChannel: LogChannel;
  catalog: ProfileCatalog;
  events: TypedEventEmitter;
}
