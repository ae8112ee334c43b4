// Request fields added by SHROUD middleware

export {};

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}
