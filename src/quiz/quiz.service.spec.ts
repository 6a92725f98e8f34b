import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { NotFoundException } from '@nestjs/common';
import { QuizService } from './quiz.service';
import { Quiz } from './entities/quiz.entity';

const QUIZ_ID = '6f1c2d3e-4a5b-4c6d-8e7f-001122334455';

describe('QuizService.findOne', () => {
  let service: QuizService;
  const quizRepository = { findOne: jest.fn() };

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [QuizService, { provide: getRepositoryToken(Quiz), useValue: quizRepository }],
    }).compile();
    service = moduleRef.get(QuizService);
  });

  it('loads the quiz with its course', async () => {
    const quiz = Object.assign(new Quiz(), { id: QUIZ_ID, courseId: 'c-1', name: 'Weekly quiz' });
    quizRepository.findOne.mockResolvedValueOnce(quiz);

    await expect(service.findOne(QUIZ_ID)).resolves.toBe(quiz);
    expect(quizRepository.findOne).toHaveBeenCalledWith({ where: { id: QUIZ_ID }, relations: ['course'] });
  });

  it('throws when the quiz does not exist', async () => {
    quizRepository.findOne.mockResolvedValueOnce(null);

    await expect(service.findOne(QUIZ_ID)).rejects.toThrow(new NotFoundException(`Quiz with ID ${QUIZ_ID} not found`));
  });

  it('does not query for malformed ids', async () => {
    await expect(service.findOne('quiz-1')).rejects.toThrow(NotFoundException);
    expect(quizRepository.findOne).not.toHaveBeenCalled();
  });
});
