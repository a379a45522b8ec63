import { Identity } from "./types";

declare global {
  namespace Express {
    interface Request {
      auth?: Identity;
    }
  }
}

export {};
