export const NAME = "fmtlatex";
export const VERSION = "0.1.0";
