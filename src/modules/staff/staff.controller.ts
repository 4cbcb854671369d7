import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
} from '@nestjs/common';
import { CurrentStaff, Roles } from '../../core/auth/auth.decorators';
import { StaffPrincipal } from '../../core/auth/auth.types';
import { CreateStaffDto, StaffUserView, UpdateStaffDto } from './dto/staff.dto';
import { StaffService } from './staff.service';

@Controller('staff')
@Roles('admin')
export class StaffController {
  constructor(private readonly staffService: StaffService) {}

  @Get()
  list(): Promise<StaffUserView[]> {
    return this.staffService.list();
  }

  @Post()
  create(@Body() dto: CreateStaffDto): Promise<StaffUserView> {
    return this.staffService.create(dto);
  }

  @Patch(':id')
  update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateStaffDto,
  ): Promise<StaffUserView> {
    return this.staffService.update(id, dto);
  }

  @Post(':id/toggle-active')
  @HttpCode(HttpStatus.OK)
  toggleActive(
    @Param('id', ParseIntPipe) id: number,
    @CurrentStaff() actor: StaffPrincipal,
  ): Promise<StaffUserView> {
    return this.staffService.toggleActive(id, actor);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(
    @Param('id', ParseIntPipe) id: number,
    @CurrentStaff() actor: StaffPrincipal,
  ): Promise<void> {
    return this.staffService.remove(id, actor);
  }
}
