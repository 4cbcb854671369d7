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
import { Public, Roles } from '../../core/auth/auth.decorators';
import { PackageDto } from './dto/package.dto';
import { Package } from './entities/package.entity';
import { PackagesService } from './packages.service';

@Controller('packages')
@Roles('admin')
export class PackagesController {
  constructor(private readonly packagesService: PackagesService) {}

  // Visitors pick a package before they self-register
  @Get()
  @Public()
  list(): Promise<Package[]> {
    return this.packagesService.list();
  }

  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number): Promise<Package> {
    return this.packagesService.findOne(id);
  }

  @Post()
  create(@Body() dto: PackageDto): Promise<Package> {
    return this.packagesService.create(dto);
  }

  @Patch(':id')
  update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: PackageDto,
  ): Promise<Package> {
    return this.packagesService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    return this.packagesService.remove(id);
  }
}
