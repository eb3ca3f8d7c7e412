import { Response } from 'express';
import type { Paginated } from '../types';

export function success<T>(res: Response, data: T, status = 200) {
  return res.status(status).json({ success: true, data });
}

export function created<T>(res: Response, data: T) {
  return success(res, data, 201);
}

export function paginated<T>(res: Response, page: Paginated<T>) {
  return success(res, page);
}
