import { IsString, MaxLength } from 'class-validator';

export class UpdateNoteDto {
  @IsString()
  @MaxLength(5000)
  note: string;
}
