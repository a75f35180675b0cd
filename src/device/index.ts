export { FtpSession, openFtpSession, classifyConnectFailure } from './ftp-session.js';
export { parseMlsdListing, parseModifyTime, isListingArtifact } from './mlsd.js';
export { createDevice, validateDevice, validateDeviceList, LATEST_SAVES_DIR } from './device.js';
export type { DeviceInput } from './device.js';
export type { Device, RemoteFile, TransferSession, SessionOpener } from './types.js';
