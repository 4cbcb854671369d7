import { Controller, Get } from '@nestjs/common';
import { Public } from './core/auth/auth.decorators';

@Controller()
export class AppController {
  @Public()
  @Get()
  getBanner(): { message: string } {
    return { message: 'Gym Manager API' };
  }
}
