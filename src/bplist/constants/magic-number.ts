export const bplistMagicNumber = 'bplist';
export const versionByteLength = 2;
/** magic number + version, where the object table begins */
export const headerByteLength = bplistMagicNumber.length + versionByteLength;
