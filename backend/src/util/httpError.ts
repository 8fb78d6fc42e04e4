export interface HttpErrorBody {
  success: false;
  cause: string;
  message: string;
}

export class HttpError extends Error {
  public readonly status: number;
  public readonly causeCode: string;

  constructor(status: number, causeCode: string, message?: string) {
    super(message ?? causeCode);
    this.name = 'HttpError';
    this.status = status;
    this.causeCode = causeCode;
  }

  toBody(): HttpErrorBody {
    return { success: false, cause: this.causeCode, message: this.message };
  }
}
