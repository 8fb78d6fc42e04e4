import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { logger, type Logger } from '../util/logger';

const headerName = 'X-Request-ID';
const acceptedIdPattern = /^[A-Za-z0-9._:-]{1,128}$/;

export const requestId = (req: Request, res: Response, next: NextFunction): void => {
  // Reuse an upstream proxy's id when it looks sane, otherwise mint one
  const incoming = req.header(headerName);
  const id = incoming && acceptedIdPattern.test(incoming) ? incoming : randomUUID();

  req.id = id;
  req.log = logger.child({ requestId: id });
  res.setHeader(headerName, id);
  res.locals.requestId = id;

  next();
};

declare global {
  namespace Express {
    interface Request {
      id: string;
      log: Logger;
    }
  }
}
