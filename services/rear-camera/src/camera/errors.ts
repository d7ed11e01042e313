export class CameraError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = 'CameraError';
    Object.setPrototypeOf(this, CameraError.prototype);
  }
}

/** A move was requested while another one is still running. */
export class CameraBusyError extends CameraError {
  constructor(action: string) {
    super(`Cannot ${action} while the camera is moving`, 'CAMERA_BUSY', 409);
    this.name = 'CameraBusyError';
  }
}
