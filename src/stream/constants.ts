// Default steady-state size of the read buffer.
export const DEFAULT_BUFFER_SIZE = 64 * 1024;

// Default number of bytes added to a full buffer while scanning for delimiters.
export const DEFAULT_BUFFER_SIZE_INCREMENT = 4 * 1024;

// Matching modes for readUntil. All of them pick the candidate with the smallest start offset;
// they differ only in how delimiters starting at that same offset are ranked.
export const MATCHING_MODES = ["earliest", "shortest", "longest"] as const;
