import { EventEmitter } from 'node:events';

// Singleton event bus for cycle notifications:
//   'trap:sample' (Sample), 'trap:fired' (TrapResponse), 'trap:error' (Error)
export const bus = new EventEmitter();
