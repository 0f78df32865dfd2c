/**
 * Erreurs applicatives
 *
 * Chaque erreur porte le code HTTP renvoyé par le gestionnaire d'erreur global.
 */

export class AppError extends Error {
  readonly statusCode: number;
  cause?: Error;

  constructor(message: string, statusCode: number, cause?: Error) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.cause = cause;
  }

  /**
   * Détails additionnels exposés dans la réponse d'erreur
   */
  get details(): unknown {
    return undefined;
  }
}

/**
 * Hébergement ou source introuvable
 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Échec de téléchargement d'un flux iCal (réseau, timeout, statut HTTP)
 *
 * Fatal pour tout l'appel de synchronisation.
 */
export class FetchError extends AppError {
  readonly url: string;
  readonly status?: number;
  readonly detail: string;

  constructor(url: string, detail: string, options: { status?: number; cause?: Error } = {}) {
    super(`Failed to fetch iCal from ${url}: ${detail}`, 400, options.cause);
    this.name = 'FetchError';
    this.url = url;
    this.status = options.status;
    this.detail = detail;
  }

  override get details(): unknown {
    return { url: this.url, status: this.status ?? null };
  }
}

export class ValidationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 400);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  override get details(): unknown {
    return this.issues.length > 0 ? this.issues : undefined;
  }
}

export class WebhookError extends AppError {
  constructor(detail: string, cause?: Error) {
    super(`Webhook error: ${detail}`, 400, cause);
    this.name = 'WebhookError';
  }
}

export class WhatsAppError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, 400, cause);
    this.name = 'WhatsAppError';
  }
}

/**
 * Message lisible d'une erreur inconnue
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function causeOf(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}
