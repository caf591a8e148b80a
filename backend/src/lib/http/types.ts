import type { Request, Response, NextFunction } from 'express';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
export type Handler = (req: Request, res: Response, next: NextFunction) => unknown;
