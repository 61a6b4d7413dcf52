import { ConsoleLogger } from '../../core/utils/Logger';

describe('ConsoleLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
    delete process.env.APPSEC_DEBUG;
  });

  it('préfixe les messages par le contexte, enfants compris', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('AppSecClient', false);

    logger.child('GetCustomDeny').info('sent', 1);

    expect(info).toHaveBeenCalledWith('[AppSecClient:GetCustomDeny] sent', 1);
  });

  it('debug seulement si activé', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);

    new ConsoleLogger('a', false).debug('hidden');
    new ConsoleLogger('a', true).child('b').debug('shown');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('[a:b] shown');
  });

  it('active debug par défaut avec APPSEC_DEBUG=1', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);

    process.env.APPSEC_DEBUG = '0';
    new ConsoleLogger('off').debug('hidden');
    process.env.APPSEC_DEBUG = '1';
    new ConsoleLogger('on').debug('shown');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('[on] shown');
  });
});
