export { ConnectionPoint, type ConnectionRole } from './connection-point.js';
export { Wire } from './wire.js';
