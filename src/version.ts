/** Recorded in `metadata.paramnb.version` of every executed notebook. */
export const PARAMNB_VERSION = '0.3.0';
