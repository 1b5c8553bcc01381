import {
  parseAction,
  encodeStartAction,
  encodeAnswerAction,
  MAX_CALLBACK_DATA_BYTES,
} from '../action-parser.utils';

describe('parseAction', () => {
  describe('start actions', () => {
    it('should parse start action', () => {
      expect(parseAction('start,123,Sprint Review')).toEqual({
        action: 'start',
        chatId: '123',
        meetingName: 'Sprint Review',
      });
    });

    it('should keep commas inside the meeting name', () => {
      expect(parseAction('start,123,Review, part 2')).toEqual({
        action: 'start',
        chatId: '123',
        meetingName: 'Review, part 2',
      });
    });

    it('should accept negative group chat ids', () => {
      expect(parseAction('start,-100200,Retro')).toEqual({
        action: 'start',
        chatId: '-100200',
        meetingName: 'Retro',
      });
    });

    it('should accept an empty meeting name', () => {
      expect(parseAction('start,123,')).toEqual({
        action: 'start',
        chatId: '123',
        meetingName: '',
      });
    });

    it('should reject start without meeting name field', () => {
      expect(parseAction('start,123')).toBeNull();
    });
  });

  describe('answer actions', () => {
    it('should parse answer action', () => {
      expect(parseAction('answer,123,m-1,1,5')).toEqual({
        action: 'answer',
        chatId: '123',
        meetingId: 'm-1',
        questionIndex: 1,
        score: 5,
      });
    });

    it('should reject wrong field count', () => {
      expect(parseAction('answer,123,m-1,1')).toBeNull();
      expect(parseAction('answer,123,m-1,1,5,9')).toBeNull();
    });

    it('should reject question index out of range', () => {
      expect(parseAction('answer,123,m-1,0,5')).toBeNull();
      expect(parseAction('answer,123,m-1,6,5')).toBeNull();
    });

    it('should reject score out of range', () => {
      expect(parseAction('answer,123,m-1,1,0')).toBeNull();
      expect(parseAction('answer,123,m-1,1,6')).toBeNull();
    });

    it('should reject non-integer fields', () => {
      expect(parseAction('answer,123,m-1,one,5')).toBeNull();
      expect(parseAction('answer,123,m-1,1,4.5')).toBeNull();
      expect(parseAction('answer,123,m-1,-1,5')).toBeNull();
    });

    it('should reject meeting ids with unexpected characters', () => {
      expect(parseAction('answer,123,m 1,1,5')).toBeNull();
      expect(parseAction('answer,123,,1,5')).toBeNull();
    });
  });

  describe('invalid formats', () => {
    it('should reject unknown action', () => {
      expect(parseAction('stop,123,x')).toBeNull();
    });

    it('should reject non-numeric chat id', () => {
      expect(parseAction('start,abc,Sprint Review')).toBeNull();
    });

    it('should reject empty payload', () => {
      expect(parseAction('')).toBeNull();
    });
  });
});

describe('encodeStartAction', () => {
  it('should produce the positional start payload', () => {
    expect(encodeStartAction('123', 'Sprint Review')).toBe(
      'start,123,Sprint Review',
    );
  });

  it('should cut long meeting names to the callback data limit', () => {
    const payload = encodeStartAction('123', 'x'.repeat(100));
    expect(Buffer.byteLength(payload, 'utf8')).toBe(MAX_CALLBACK_DATA_BYTES);
    expect(payload).toBe(`start,123,${'x'.repeat(54)}`);
  });

  it('should not split multi-byte characters', () => {
    // 'я' is 2 bytes in UTF-8; 54 bytes of budget hold 27 of them
    const payload = encodeStartAction('123', 'я'.repeat(40));
    expect(payload).toBe(`start,123,${'я'.repeat(27)}`);
  });
});

describe('encodeAnswerAction', () => {
  it('should produce a payload that parses back', () => {
    const payload = encodeAnswerAction('123', 'm-1', 3, 4);
    expect(payload).toBe('answer,123,m-1,3,4');
    expect(parseAction(payload)).toEqual({
      action: 'answer',
      chatId: '123',
      meetingId: 'm-1',
      questionIndex: 3,
      score: 4,
    });
  });
});
