import { z } from 'zod';
import { getWeekdayName, toDateKey } from '@/utils/date';

// Rows loaded from an older file may carry text where the form writes
// numbers or Yes/No; those cells travel back unchanged.
const flag = z.string();
const cell = z.union([z.number().finite(), z.string()]);

export const logEntrySchema = z
    .object({
        date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).refine(d => toDateKey(d) === d, 'Invalid calendar date'),
        weekday: z.string(),
        ordinaryDay: flag,
        screenTime: cell,
        studyTime: cell,
        studyQuality: cell,
        meditation: flag,
        morningStudy: flag,
        morningPhone: flag,
        lunchPhone: flag,
        dinnerPhone: flag,
        running: flag,
        p: flag,
        morningWakeUpHour: cell,
        notes: z.string(),
        planStrategies: z.string(),
    })
    .refine(entry => {
        const date = toDateKey(entry.date);
        return date === null || entry.weekday === getWeekdayName(date);
    }, {
        message: 'Weekday does not match date',
        path: ['weekday'],
    });

export const saveTableBodySchema = z.object({
    entries: z.array(logEntrySchema),
    message: z.string().trim().min(1).max(200).optional(),
});
