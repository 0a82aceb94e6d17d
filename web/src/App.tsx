import { useCallback, useMemo, useState } from 'react';
import { OtpField } from './components/OtpField';
import { ErrorBoundary } from './components/ErrorBoundary';
import { createDemoValidator } from './lib/demoValidator';
import { FIELD_STYLES, type FieldStyle, type TypingState } from './lib/otpConfig';
import './App.css';

// The code the demo accepts
const DEMO_CODE = '123456';
const DEMO_FIELDS = DEMO_CODE.length;

const stateLabels: Record<TypingState, string> = {
  typing: 'Waiting for the full code',
  valid: 'Code accepted',
  invalid: 'Wrong code, try again',
};

function App() {
  const [otp, setOtp] = useState('');
  const [style, setStyle] = useState<FieldStyle>('roundedBorder');
  const [lastState, setLastState] = useState<TypingState>('typing');
  // Remounting the field resets its typing state
  const [fieldKey, setFieldKey] = useState(0);

  const demoValidator = useMemo(
    () => createDemoValidator({ expectedCode: DEMO_CODE, numberOfFields: DEMO_FIELDS }),
    [],
  );

  const validate = useCallback(async (value: string) => {
    const result = await demoValidator(value);
    setLastState(result);
    return result;
  }, [demoValidator]);

  const config = useMemo(() => ({ numberOfFields: DEMO_FIELDS, style }), [style]);

  const reset = useCallback(() => {
    setOtp('');
    setLastState('typing');
    setFieldKey((k) => k + 1);
  }, []);

  return (
    <main className="app">
      <h1 className="app-title">Enter verification code</h1>
      <p className="app-hint">
        Try <code>{DEMO_CODE}</code>
      </p>

      <div className="app-styles" role="radiogroup" aria-label="Field style">
        {FIELD_STYLES.map((s) => (
          <label key={s.id} className="app-style-option">
            <input
              type="radio"
              name="field-style"
              value={s.id}
              checked={style === s.id}
              onChange={() => setStyle(s.id)}
            />
            {s.label}
          </label>
        ))}
      </div>

      <ErrorBoundary scope="OtpDemo">
        <OtpField
          key={fieldKey}
          value={otp}
          onValueChange={setOtp}
          validate={validate}
          config={config}
          autoFocus
        />
      </ErrorBoundary>

      <p className={`app-status ${lastState}`} aria-live="polite">
        {stateLabels[lastState]}
      </p>

      <button type="button" className="app-reset" onClick={reset}>
        Reset
      </button>
    </main>
  );
}

export default App;
