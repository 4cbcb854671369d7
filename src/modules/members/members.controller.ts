import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';
import { Public, Roles } from '../../core/auth/auth.decorators';
import {
  MemberView,
  RegisterMemberDto,
  RegistrationResultDto,
} from './dto/register-member.dto';
import { MembersService } from './members.service';

@Controller('members')
@Roles('receptionist')
export class MembersController {
  constructor(private readonly membersService: MembersService) {}

  @Get()
  list(): Promise<MemberView[]> {
    return this.membersService.list();
  }

  @Post()
  register(@Body() dto: RegisterMemberDto): Promise<RegistrationResultDto> {
    return this.membersService.register(dto);
  }

  /**
   * Self-service sign-up from the public site
   */
  @Public()
  @Post('register')
  selfRegister(@Body() dto: RegisterMemberDto): Promise<RegistrationResultDto> {
    return this.membersService.register(dto);
  }

  @Delete(':id')
  @Roles('admin')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    return this.membersService.remove(id);
  }
}
