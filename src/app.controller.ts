import { Controller, Get } from '@nestjs/common';
import { STANDARD_SEGMENT_DESCRIPTIONS } from './edi/config/edi.config';

@Controller()
export class AppController {
  @Get()
  getInfo() {
    return {
      name: 'EDI Grammar Extractor',
      version: '1.0.0',
      description: 'Extraction des grammaires de messages EDI depuis les guides PDF',
      conventions: ['faurecia', 'vda4932'],
      standardSegments: STANDARD_SEGMENT_DESCRIPTIONS.size,
      endpoints: {
        edi: {
          'POST /api/edi/extract': 'Extraire un guide PDF (multipart, champ "file")',
          'POST /api/edi/batch': 'Traiter tous les PDF du dossier schema',
        },
      },
    };
  }

  @Get('health')
  healthCheck() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}
