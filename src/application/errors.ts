/** The dashboard's static files could not be read; the console cannot start. */
export class StaticAssetsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StaticAssetsError';
  }
}
