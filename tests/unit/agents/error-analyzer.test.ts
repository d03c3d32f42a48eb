import { ErrorAnalyzer } from '../../../src/agents/error-analyzer';
import { StubRetriever, hit } from '../../helpers/fakes';

const TRACEBACK = ['Traceback (most recent call last):', '  File "main.py", line 7, in <module>', "NameError: name 'screen' is not defined"].join('\n');

describe('ErrorAnalyzer', () => {
  it('should classify a NameError as a high severity name_error with evidence', () => {
    const analyzer = new ErrorAnalyzer(new StubRetriever());

    expect(analyzer.classify(TRACEBACK)).toEqual([{ type: 'name_error', severity: 'high', description: "Undefined name: NameError: name 'screen' is not defined" }]);
  });

  it('should classify missing modules as import errors', () => {
    const analyzer = new ErrorAnalyzer(new StubRetriever());

    expect(analyzer.classify("ModuleNotFoundError: No module named 'pygame'").map((i) => [i.type, i.severity])).toEqual([['import_error', 'critical']]);
  });

  it('should report several matching rules in taxonomy order', () => {
    const analyzer = new ErrorAnalyzer(new StubRetriever());
    const output = 'IndentationError: unexpected indent\nAttributeError: module has no attribute';

    expect(analyzer.classify(output).map((i) => i.type)).toEqual(['syntax_error', 'attribute_error']);
  });

  it('should treat empty output and timeouts as a black screen', () => {
    const analyzer = new ErrorAnalyzer(new StubRetriever());

    expect(analyzer.classify('').map((i) => i.type)).toEqual(['black_screen_or_timeout']);
    expect(analyzer.classify('Timeout: program ran for more than 30 seconds')[0]?.description).toBe(
      'Black screen or timeout (the program produced no output or never finished): Timeout: program ran for more than 30 seconds',
    );
  });

  it('should detect encoding failures', () => {
    const analyzer = new ErrorAnalyzer(new StubRetriever());
    const output = "SyntaxError: Non-UTF-8 code starting with '\\xd0' in file main.py, but no encoding declared";

    expect(analyzer.classify(output).map((i) => i.type)).toEqual(['encoding_error', 'syntax_error']);
  });

  it('should attach the first retrieved error pattern as ASCII context', async () => {
    const retriever = new StubRetriever({ error_patterns: [hit('error_patterns', 'name', 'NameError → define the variable before use')] });
    const analyzer = new ErrorAnalyzer(retriever);

    const [issue] = await analyzer.analyze(TRACEBACK);

    expect(issue?.ragContext).toBe('NameError  define the variable before use');
    expect(retriever.calls).toEqual([{ query: 'name_error', category: 'error_patterns', topK: 1 }]);
  });

  it('should use an empty context when nothing is retrieved', async () => {
    const [issue] = await new ErrorAnalyzer(new StubRetriever()).analyze(TRACEBACK);
    expect(issue?.ragContext).toBe('');
  });
});
