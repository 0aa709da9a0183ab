export * from './SessionService.js';
export * from './ReaperService.js';
export * from './ChannelService.js';
export * from './StreamService.js';
export * from './ProtocolDispatcher.js';
