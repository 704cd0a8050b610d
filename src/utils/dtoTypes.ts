import { z } from 'zod';

// OTA DTOs
export const checkUpdateQuerySchema = z
  .object({
    current_version: z
      .string({
        required_error: 'current_version is required',
        invalid_type_error: 'current_version must be a single value',
      })
      .trim()
      .min(1, 'current_version is required'),
  })
  .passthrough();

export const downloadQuerySchema = z
  .object({
    version: z
      .string({
        required_error: 'version is required',
        invalid_type_error: 'version must be a single value',
      })
      .min(1, 'version is required'),
  })
  .passthrough();
