import type { Request, Response } from 'express';
import { z, type ZodError } from 'zod';
import { logAndRespond, respondWithCode } from '../core/logger';
import { ValidationError } from '../core/scheduling/shopSettings';
import type { BookingResult } from '../core/scheduling/results';
import { minutesToTime, parseTimeString } from '../core/scheduling/timeUtils';
import type { Booking } from '../core/scheduling/types';
import { isValidDateString } from '../utils/dateUtils';

export const dateSchema = z.string().refine(isValidDateString, { message: 'Expected a date in YYYY-MM-DD form' });

/** "HH:MM" (24:00 allowed) to minutes since midnight. */
export const timeSchema = z.string().transform((value, ctx) => {
  const minutes = parseTimeString(value);
  if (minutes === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a time in HH:MM form' });
    return z.NEVER;
  }
  return minutes;
});

export const idParamSchema = z.coerce.number().int().positive();

export function describeZodError(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function respondInvalid(req: Request, res: Response, error: ZodError | string) {
  const message = typeof error === 'string' ? error : describeZodError(error);
  respondWithCode(req, res, 400, message, 'VALIDATION_ERROR');
}

/**
 * ValidationErrors thrown by the services answer 400 with the failing field; anything else
 * is logged and answered 500.
 */
export function handleRouteError(req: Request, res: Response, error: unknown, message: string, code: string) {
  if (error instanceof ValidationError) {
    respondWithCode(req, res, 400, error.message, 'VALIDATION_ERROR', { field: error.field });
    return;
  }
  logAndRespond(req, res, 500, message, error, code);
}

export interface BookingDto {
  id: number;
  clientId: string;
  date: string;
  startTime: string;
  endTime: string;
  durationMinutes: number;
  occupyMinutes: number | null;
  serviceCode: string | null;
  serviceName: string;
  clientName: string;
  phone: string;
  status: Booking['status'];
  createdAt: string;
  updatedAt: string;
}

export function serializeBooking(booking: Booking): BookingDto {
  return {
    id: booking.id,
    clientId: booking.clientId,
    date: booking.date,
    startTime: minutesToTime(booking.startTime),
    endTime: minutesToTime(booking.startTime + booking.durationMinutes),
    durationMinutes: booking.durationMinutes,
    occupyMinutes: booking.occupancy.kind === 'explicit' ? booking.occupancy.minutes : null,
    serviceCode: booking.serviceCode,
    serviceName: booking.serviceName,
    clientName: booking.clientName,
    phone: booking.phone,
    status: booking.status,
    createdAt: booking.createdAt.toISOString(),
    updatedAt: booking.updatedAt.toISOString(),
  };
}

export function sendBookingResult(req: Request, res: Response, result: BookingResult, successStatus: number = 200) {
  if (result.success) {
    res.status(successStatus).json({ success: true, booking: serializeBooking(result.booking) });
    return;
  }
  const extra = result.conflictingBookingId !== undefined
    ? { conflictingBookingId: result.conflictingBookingId }
    : undefined;
  respondWithCode(req, res, result.statusCode, result.error, result.code, extra);
}
