export { listFiles, deleteFile, folderStats, directoryExists } from './service';
