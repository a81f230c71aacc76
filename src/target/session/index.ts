export * from './session-channel.js';
export * from './expect-buffer.js';
export * from './stream-session.js';
export * from './reconnecting-session.js';
export * from './ssh-transport.js';
