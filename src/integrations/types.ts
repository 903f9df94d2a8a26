/** A program that can open a project directory. */
export interface ToolIntegration {
  readonly name: string;
  readonly displayName: string;
  readonly icon: string;
  /** Whether the program can be found on this machine */
  isAvailable(): boolean;
  /** Resolves true once the program has been started */
  launch(path: string): Promise<boolean>;
  /** Open the project with one file focused */
  launchFile?(path: string, file: string): Promise<boolean>;
}
