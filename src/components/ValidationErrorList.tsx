import type { ValidationFailureV1 } from '../contracts/HeatLossOutputV1';

interface Props {
  failure: ValidationFailureV1;
}

export default function ValidationErrorList({ failure }: Props) {
  return (
    <div className="validation-errors" role="alert">
      <h3>Check your inputs</h3>
      <ul>
        {failure.errors.map(message => (
          <li key={message}>{message}</li>
        ))}
      </ul>
    </div>
  );
}
