/** Package version, reported by `brewport --version` */
export const VERSION = '0.1.0';
