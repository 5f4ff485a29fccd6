/**
 * Registry entry handed to the host's registration tool.
 */
export interface KernelSpecDescriptor {
  readonly displayName: string;
  readonly languageName: string;
  /**
   * Launch command tokens. The last token is always the connection file
   * placeholder, substituted by the host at spawn time.
   */
  readonly argv: readonly string[];
}

/** On-disk shape of `kernel.json`, as the host reads it. */
export interface KernelSpecFile {
  argv: string[];
  display_name: string;
  language: string;
}
