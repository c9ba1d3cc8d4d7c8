export class GpxError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GpxError';
  }
}

export class GpxParseError extends GpxError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GpxParseError';
  }
}

export class MalformedXmlError extends GpxParseError {
  constructor(detail: string) {
    super(`Failed to parse GPX: invalid XML (${detail})`);
    this.name = 'MalformedXmlError';
  }
}

export class InvalidChildElementError extends GpxParseError {
  constructor(
    readonly child: string,
    readonly parent: string,
  ) {
    super(`invalid child element '${child}' in '${parent}'`);
    this.name = 'InvalidChildElementError';
  }
}

export class InvalidScalarValueError extends GpxParseError {
  constructor(
    readonly field: string,
    readonly value: string,
    reason?: string,
  ) {
    super(`invalid value '${value}' for '${field}'${reason ? `: ${reason}` : ''}`);
    this.name = 'InvalidScalarValueError';
  }
}

export class MissingAttributeError extends GpxParseError {
  constructor(
    readonly attribute: string,
    readonly element: string,
  ) {
    super(`element '${element}' lacks required attribute '${attribute}'`);
    this.name = 'MissingAttributeError';
  }
}

export class UnsupportedVersionError extends GpxParseError {
  constructor(readonly version: string) {
    super(`unsupported GPX version '${version}'`);
    this.name = 'UnsupportedVersionError';
  }
}

export class GpxWriteError extends GpxError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GpxWriteError';
  }
}
