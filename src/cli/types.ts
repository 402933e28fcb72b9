/**
 * Options shared by every command.
 */
export interface GlobalOptions {
  verbose?: boolean;
  silent?: boolean;
}
