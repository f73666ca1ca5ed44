import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  Header,
  NotFoundException,
  Param,
  Post,
  Put,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { GradebookService } from './gradebook.service';
import { CreateCourseDto } from './dtos/create-course.dto';
import { CreateStudentDto } from './dtos/create-student.dto';
import { SetGradeDto } from './dtos/set-grade.dto';
import { GradeEntryStatus } from './enums/grade-entry-status.enum';
import { CourseData } from './interfaces/gradebook-document.interface';
import { StudentView } from './interfaces/student-view.interface';
import { toStudentView } from './utils/student-view.utils';

@ApiTags('Gradebook')
@Controller('gradebook')
export class GradebookController {
  constructor(private readonly gradebookService: GradebookService) {}

  @Get('courses')
  @ApiOperation({ summary: 'List courses' })
  listCourses(): CourseData[] {
    return this.gradebookService.listCourses().map((course) => course.toData());
  }

  @Post('courses')
  @ApiOperation({ summary: 'Add a course' })
  @ApiResponse({ status: 409, description: 'Course code already exists' })
  async addCourse(@Body() dto: CreateCourseDto): Promise<CourseData> {
    const added = await this.gradebookService.addCourse(dto.code, dto.name, dto.credit);
    if (!added) {
      throw new ConflictException(`Course ${dto.code.toUpperCase()} already exists`);
    }
    const course = this.gradebookService.findCourse(dto.code);
    if (!course) throw new NotFoundException('Course not found');
    return course.toData();
  }

  @Post('students')
  @ApiOperation({ summary: 'Add a student' })
  @ApiResponse({ status: 409, description: 'Student id already registered' })
  async addStudent(@Body() dto: CreateStudentDto): Promise<StudentView> {
    const added = await this.gradebookService.addStudent(dto.id, dto.name, dto.className);
    if (!added) {
      throw new ConflictException(`Student ${dto.id} already exists`);
    }
    return this.getStudent(dto.id);
  }

  @Get('students/:id')
  @ApiOperation({ summary: 'Student grades with averages and letter grades' })
  getStudent(@Param('id') id: string): StudentView {
    const student = this.gradebookService.findStudent(id);
    if (!student) throw new NotFoundException(GradeEntryStatus.STUDENT_NOT_FOUND);
    return toStudentView(student);
  }

  @Put('students/:id/grades/:courseCode')
  @ApiOperation({ summary: 'Enter or update grades; omitted scores are kept' })
  async setGrade(
    @Param('id') id: string,
    @Param('courseCode') courseCode: string,
    @Body() dto: SetGradeDto,
  ): Promise<StudentView> {
    const status = await this.gradebookService.setGrade(id, courseCode, {
      exam1: dto.exam1,
      exam2: dto.exam2,
      project: dto.project,
    });
    if (status === GradeEntryStatus.INVALID_SCORE) {
      throw new BadRequestException(status);
    }
    if (status !== GradeEntryStatus.UPDATED) {
      throw new NotFoundException(status);
    }
    return this.getStudent(id);
  }

  @Get('students/:id/report')
  @Header('Content-Type', 'text/plain; charset=utf-8')
  @ApiOperation({ summary: 'Fixed-width report card' })
  getReport(@Param('id') id: string): string {
    const report = this.gradebookService.buildReport(id);
    if (report === undefined) throw new NotFoundException(GradeEntryStatus.STUDENT_NOT_FOUND);
    return report;
  }
}
