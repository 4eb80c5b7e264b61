export type ID = string;
