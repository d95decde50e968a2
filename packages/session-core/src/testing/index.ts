export { FakeRemoteFileService, testCredentials, type RemoteCall, type RemoteMethod } from './fake-remote.js';
export { ManualClock, flushAsync } from './manual-clock.js';
export { MemoryChatFileStore } from './memory-chat-files.js';
export { staticProfiles, testProfile } from './profiles.js';
