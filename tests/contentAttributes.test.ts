import { extractAttributes } from '../src/learning/contentAttributes';

describe('extractAttributes', () => {
  it('should detect every style attribute of a composed post', () => {
    expect(extractAttributes('⚽ Who wins tonight? #UCL\n\nhttps://t.example/1')).toEqual({
      hasEmoji: true,
      hasQuestion: true,
      hasHashtag: true,
      hasLink: true,
      wordCount: 3,
      charCount: 45,
    });
  });

  it('should report plain prose as having none of them', () => {
    expect(extractAttributes('Markets close higher')).toEqual({
      hasEmoji: false,
      hasQuestion: false,
      hasHashtag: false,
      hasLink: false,
      wordCount: 3,
      charCount: 20,
    });
  });

  it('should not count a question mark inside a link', () => {
    expect(extractAttributes('Read this https://t.example/a?b=1').hasQuestion).toBe(false);
  });

  it('should only treat a word-initial # as a hashtag', () => {
    expect(extractAttributes('Learning C# today').hasHashtag).toBe(false);
    expect(extractAttributes('#Bitcoin hits a new high').hasHashtag).toBe(true);
  });

  it('should leave links and hashtags out of the word count', () => {
    expect(extractAttributes('Big news #F1 #Monaco https://t.example/1').wordCount).toBe(2);
  });
});
