import { z } from 'zod';

// Zoom API Response Types
export const ZoomTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
  scope: z.string().optional()
});

export type ZoomTokenResponse = z.infer<typeof ZoomTokenResponseSchema>;

export const ZoomRecordingFileSchema = z.object({
  id: z.string().optional(),
  file_type: z.string().optional(),
  file_extension: z.string().optional(),
  file_size: z.number().optional(),
  download_url: z.string().optional(),
  recording_type: z.string().optional(),
  status: z.string().optional()
});

export type ZoomRecordingFile = z.infer<typeof ZoomRecordingFileSchema>;

export const ZoomRecordingsResponseSchema = z.object({
  uuid: z.string().optional(),
  id: z.union([z.number(), z.string()]).optional(),
  topic: z.string().optional(),
  recording_files: z.array(ZoomRecordingFileSchema).optional()
});

export type ZoomRecordingsResponse = z.infer<typeof ZoomRecordingsResponseSchema>;

// Vimeo API Response Types
export const VimeoUploadTicketSchema = z.object({
  uri: z.string().min(1),
  name: z.string().optional(),
  link: z.string().optional(),
  upload: z.object({
    approach: z.string().optional(),
    upload_link: z.string().min(1),
    size: z.union([z.number(), z.string()]).optional()
  })
});

export type VimeoUploadTicket = z.infer<typeof VimeoUploadTicketSchema>;

export const VimeoTokenInfoSchema = z.object({
  scope: z.string().optional(),
  user: z.object({
    uri: z.string(),
    name: z.string().optional()
  }).optional()
});

export type VimeoTokenInfo = z.infer<typeof VimeoTokenInfoSchema>;

export const VimeoUserSchema = z.object({
  uri: z.string(),
  name: z.string().optional(),
  account: z.string().optional(),
  account_type: z.string().optional()
});

export type VimeoUser = z.infer<typeof VimeoUserSchema>;

export const VimeoNamedResourceSchema = z.object({
  uri: z.string(),
  name: z.string().optional()
});

export type VimeoNamedResource = z.infer<typeof VimeoNamedResourceSchema>;

export const VimeoPageSchema = z.object({
  total: z.number().optional(),
  page: z.number().optional(),
  per_page: z.number().optional(),
  paging: z.object({
    next: z.string().nullable().optional()
  }).optional(),
  data: z.array(VimeoNamedResourceSchema)
});

export type VimeoPage = z.infer<typeof VimeoPageSchema>;

// Tus upload settings accepted by Vimeo
export type VimeoPrivacy = 'anybody' | 'nobody' | 'unlisted' | 'password' | 'disable';

export interface VideoMetadata {
  name: string;
  privacy: VimeoPrivacy;
}
