export class CalendarCliError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CalendarCliError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised by the core when its input violates a contract. `fragment` is the
 * piece of input the caller should point the user at.
 */
export class InputError extends CalendarCliError {
  public readonly fragment: string;

  constructor(message: string, code: string, fragment: string, options?: ErrorOptions) {
    super(message, code, options);
    this.name = 'InputError';
    this.fragment = fragment;
  }
}

export class UnrecognizedDateError extends InputError {
  constructor(fragment: string, options?: ErrorOptions) {
    super(`Unrecognized date: "${fragment}"`, 'UNRECOGNIZED_DATE', fragment, options);
    this.name = 'UnrecognizedDateError';
  }
}

export class UnrecognizedTimeError extends InputError {
  constructor(fragment: string, options?: ErrorOptions) {
    super(`Unrecognized time: "${fragment}"`, 'UNRECOGNIZED_TIME', fragment, options);
    this.name = 'UnrecognizedTimeError';
  }
}

export class AmbiguousTimeError extends InputError {
  constructor(fragment: string, options?: ErrorOptions) {
    super(
      `Ambiguous time "${fragment}": add am/pm or use HH:MM`,
      'AMBIGUOUS_TIME',
      fragment,
      options
    );
    this.name = 'AmbiguousTimeError';
  }
}

export class InvalidLocalTimeError extends InputError {
  constructor(fragment: string, zone: string, options?: ErrorOptions) {
    super(`Local time ${fragment} does not exist in ${zone}`, 'INVALID_LOCAL_TIME', fragment, options);
    this.name = 'InvalidLocalTimeError';
  }
}

export class AmbiguousLocalizationError extends InputError {
  constructor(fragment: string, options?: ErrorOptions) {
    super(
      `Conflicting UTC offsets in ${fragment}; pass a timezone override to resolve`,
      'AMBIGUOUS_LOCALIZATION',
      fragment,
      options
    );
    this.name = 'AmbiguousLocalizationError';
  }
}

export class UnknownTimezoneError extends InputError {
  constructor(fragment: string, options?: ErrorOptions) {
    super(`Unknown timezone: "${fragment}"`, 'UNKNOWN_TIMEZONE', fragment, options);
    this.name = 'UnknownTimezoneError';
  }
}

export class QuickaddParseError extends InputError {
  constructor(reason: string, fragment: string, options?: ErrorOptions) {
    super(reason, 'QUICKADD_PARSE', fragment, options);
    this.name = 'QuickaddParseError';
  }
}

export class UnsupportedRecurrenceError extends InputError {
  constructor(reason: string, fragment: string, options?: ErrorOptions) {
    super(`Unsupported recurrence (${reason}): ${fragment}`, 'UNSUPPORTED_RECURRENCE', fragment, options);
    this.name = 'UnsupportedRecurrenceError';
  }
}

export class MalformedPayloadError extends InputError {
  constructor(reason: string, fragment: string, options?: ErrorOptions) {
    super(`Malformed event payload (${reason})`, 'MALFORMED_PAYLOAD', fragment, options);
    this.name = 'MalformedPayloadError';
  }
}

export class InvalidEventError extends InputError {
  constructor(reason: string, fragment: string, options?: ErrorOptions) {
    super(`Invalid event: ${reason}`, 'INVALID_EVENT', fragment, options);
    this.name = 'InvalidEventError';
  }
}

export class IcsImportError extends InputError {
  constructor(reason: string, fragment: string, options?: ErrorOptions) {
    super(`ICS import failed (${reason}): ${fragment}`, 'ICS_IMPORT', fragment, options);
    this.name = 'IcsImportError';
  }
}

export class AdapterError extends CalendarCliError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class CalendarApiError extends AdapterError {
  public readonly status?: number;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super('CALENDAR', message, options);
    this.name = 'CalendarApiError';
    this.status = status;
  }
}

export class AuthenticationError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('AUTH', message, options);
    this.name = 'AuthenticationError';
  }
}

export class EventNotFoundError extends AdapterError {
  constructor(eventId: string, options?: ErrorOptions) {
    super('CALENDAR', `Event not found: ${eventId}`, options);
    this.name = 'EventNotFoundError';
  }
}

export class ConfigError extends CalendarCliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
