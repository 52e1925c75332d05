export {
    handleDownloadCommand,
    type DownloadCommandDeps,
    type DownloadCommandOptions,
    type DownloadCommandOptionsInput,
} from './download.js';
