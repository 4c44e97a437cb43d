export type ApiEnvelope<T> = {
  ok: true;
  data: T;
  correlationId?: string;
};

export type ApiErrorEnvelope = {
  ok: false;
  error: {
    code: string;
    message: string;
  };
  correlationId: string;
};
