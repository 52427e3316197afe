import { z } from 'zod';
import { text } from '@geav/shared';

export const NamedEntityPayloadSchema = z.object({ name: text() });
