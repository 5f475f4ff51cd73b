/**
 * Fehler-Taxonomie des Supervisors.
 *
 * - ReadError: Lesefehler eines Sensors (Transport oder Parsing)
 * - CommandError: Befehl an die Wallbox konnte nicht ausgeführt werden
 * - VehicleError: Fahrzeug-Cloud nicht erreichbar oder Antwort unbrauchbar
 * - ValidationError: ungültige Eingabe von außen (API, Konfiguration)
 */
export type SupervisorErrorKind = "read" | "command" | "vehicle" | "validation";

export abstract class SupervisorError extends Error {
  abstract readonly kind: SupervisorErrorKind;

  constructor(message: string, readonly source?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ReadError extends SupervisorError {
  readonly kind = "read";
}

export class CommandError extends SupervisorError {
  readonly kind = "command";
}

export class VehicleError extends SupervisorError {
  readonly kind = "vehicle";
}

export class ValidationError extends SupervisorError {
  readonly kind = "validation";
  readonly status = 400;

  constructor(message: string, readonly issues: string[] = [], options?: { cause?: unknown }) {
    super(message, "api", options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
