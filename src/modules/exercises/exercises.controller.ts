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
import { Roles } from '../../core/auth/auth.decorators';
import { ExerciseDto } from './dto/exercise.dto';
import { Exercise } from './entities/exercise.entity';
import { ExercisesService } from './exercises.service';

@Controller('exercises')
@Roles('admin')
export class ExercisesController {
  constructor(private readonly exercisesService: ExercisesService) {}

  @Get()
  @Roles('receptionist', 'cashier', 'trainer')
  list(): Promise<Exercise[]> {
    return this.exercisesService.list();
  }

  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number): Promise<Exercise> {
    return this.exercisesService.findOne(id);
  }

  @Post()
  create(@Body() dto: ExerciseDto): Promise<Exercise> {
    return this.exercisesService.create(dto);
  }

  @Patch(':id')
  update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: ExerciseDto,
  ): Promise<Exercise> {
    return this.exercisesService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    return this.exercisesService.remove(id);
  }
}
