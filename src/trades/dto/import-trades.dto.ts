import { IsNotEmpty, IsString } from 'class-validator';

// Broker CSV export submitted as text.
// source is the file name; a source is only ever imported once.
export class ImportTradesDto {
  @IsString()
  @IsNotEmpty()
  source!: string;

  @IsString()
  csv!: string;
}
