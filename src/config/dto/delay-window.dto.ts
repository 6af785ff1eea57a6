import { IsNumber, Min } from 'class-validator';

export class DelayWindowDto {
  @IsNumber()
  @Min(0)
  minSeconds!: number;

  @IsNumber()
  @Min(0)
  maxSeconds!: number;

  static of(minSeconds: number, maxSeconds: number): DelayWindowDto {
    const window = new DelayWindowDto();
    window.minSeconds = minSeconds;
    window.maxSeconds = maxSeconds;
    return window;
  }
}
