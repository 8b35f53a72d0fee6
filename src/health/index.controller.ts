import { Controller, Get } from '@nestjs/common';
import { INDEX_BODY } from '../common/constants';

@Controller()
export class IndexController {
  @Get()
  index(): string {
    return INDEX_BODY;
  }
}
