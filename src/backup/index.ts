export { BackupStore, formatBackupName, isBackupName } from './backup-store.js';
