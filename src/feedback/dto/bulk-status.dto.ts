import { IsOptional } from 'class-validator';

/**
 * Ids and status are checked by parseBulkStatusRequest so that each
 * failure gets its own message and nothing is mutated on a bad id.
 */
export class BulkStatusDto {
  @IsOptional()
  ids?: unknown;

  @IsOptional()
  status?: unknown;
}
