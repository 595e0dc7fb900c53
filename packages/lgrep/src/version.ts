export const LGREP_VERSION = "0.1.0";
