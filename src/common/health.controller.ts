import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

interface Status {
  status: string;
  timestamp: string;
}

@ApiTags('system')
@Controller('health')
export class HealthController {
  @Get()
  @ApiOperation({ summary: 'Health check endpoint' })
  check(): Status {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}
