import { IsOptional, IsString, Matches } from 'class-validator';

/** Le dossier traité est toujours `app.schemaDir`; seul un nom de fichier peut être choisi */
export class RunBatchDto {
  @IsOptional()
  @IsString()
  @Matches(/^[^/\\]+\.pdf$/i, { message: 'file doit désigner un fichier .pdf du dossier schema' })
  file?: string;
}
