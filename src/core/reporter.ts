// Presentation seam. Nothing in the release flow branches on what is printed.
export interface Reporter {
  header(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  line(message?: string): void;
  debug(message: string): void;
}

export const silentReporter: Reporter = {
  header: () => undefined,
  info: () => undefined,
  success: () => undefined,
  warning: () => undefined,
  error: () => undefined,
  line: () => undefined,
  debug: () => undefined,
};
