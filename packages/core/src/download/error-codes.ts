/**
 * Error codes for download operations.
 */
export enum DownloadErrorCode {
    /** A tool the selected items need is not installed (fatal, pre-run) */
    MISSING_PREREQUISITE_TOOL = 'download_missing_prerequisite_tool',
    /** Provider tool exited non-zero, could not be spawned, or HTTP failed */
    TRANSFER_FAILED = 'download_transfer_failed',
    /** Transfer stopped before completion; the partial file is kept */
    TRANSFER_INTERRUPTED = 'download_transfer_interrupted',
    /** Downloaded artifact digest differs from the configured checksum */
    CHECKSUM_MISMATCH = 'download_checksum_mismatch',
    /** A regular file occupies the default-model link name */
    DEFAULT_LINK_CONFLICT = 'download_default_link_conflict',
    /** The default-model link could not be read, removed or created */
    DEFAULT_LINK_FAILED = 'download_default_link_failed',
    /** Completion marker could not be written */
    MARKER_WRITE_FAILED = 'download_marker_write_failed',
}
