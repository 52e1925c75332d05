/**
 * Error factory for download operations.
 */

import { NeurobikRuntimeError } from '../errors/NeurobikRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { DownloadErrorCode } from './error-codes.js';

export const DownloadError = {
    missingPrerequisiteTool(tool: string, neededFor: string, installHint: string): NeurobikRuntimeError {
        return new NeurobikRuntimeError(
            DownloadErrorCode.MISSING_PREREQUISITE_TOOL,
            ErrorScope.DOWNLOAD,
            ErrorType.NOT_FOUND,
            `${tool} is not installed but is required for ${neededFor}`,
            { tool, neededFor },
            installHint
        );
    },

    transferFailed(item: string, reason: string): NeurobikRuntimeError {
        return new NeurobikRuntimeError(
            DownloadErrorCode.TRANSFER_FAILED,
            ErrorScope.DOWNLOAD,
            ErrorType.THIRD_PARTY,
            `Failed to transfer '${item}': ${reason}`,
            { item, reason },
            'Run the download again; completed items will not be offered twice'
        );
    },

    transferInterrupted(item: string, partialPath: string): NeurobikRuntimeError {
        return new NeurobikRuntimeError(
            DownloadErrorCode.TRANSFER_INTERRUPTED,
            ErrorScope.DOWNLOAD,
            ErrorType.THIRD_PARTY,
            `Transfer of '${item}' was interrupted`,
            { item, partialPath },
            'Run the download again to resume'
        );
    },

    checksumMismatch(
        item: string,
        filePath: string,
        expected: string,
        actual: string
    ): NeurobikRuntimeError {
        return new NeurobikRuntimeError(
            DownloadErrorCode.CHECKSUM_MISMATCH,
            ErrorScope.DOWNLOAD,
            ErrorType.USER,
            `Checksum mismatch for '${item}'. Expected: ${expected}, Got: ${actual}`,
            { item, filePath, expected, actual },
            `Inspect or delete ${filePath}, then run the download again`
        );
    },

    defaultLinkConflict(linkPath: string): NeurobikRuntimeError {
        return new NeurobikRuntimeError(
            DownloadErrorCode.DEFAULT_LINK_CONFLICT,
            ErrorScope.DOWNLOAD,
            ErrorType.CONFLICT,
            `Cannot create default model link: ${linkPath} exists and is not a symlink`,
            { linkPath },
            `Move or remove ${linkPath} and run the download again`
        );
    },

    defaultLinkFailed(linkPath: string, reason: string): NeurobikRuntimeError {
        return new NeurobikRuntimeError(
            DownloadErrorCode.DEFAULT_LINK_FAILED,
            ErrorScope.DOWNLOAD,
            ErrorType.SYSTEM,
            `Failed to update default model link ${linkPath}: ${reason}`,
            { linkPath, reason }
        );
    },

    markerWriteFailed(markerPath: string, reason: string): NeurobikRuntimeError {
        return new NeurobikRuntimeError(
            DownloadErrorCode.MARKER_WRITE_FAILED,
            ErrorScope.CONFIRMATION,
            ErrorType.SYSTEM,
            `Failed to write completion marker ${markerPath}: ${reason}`,
            { markerPath, reason },
            'Check permissions on the confirmation directory'
        );
    },
};
