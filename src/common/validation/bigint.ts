import { Transform } from "class-transformer";
import { ValidateBy, ValidationOptions, buildMessage } from "class-validator";

function toBigInt(value: unknown): unknown {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
  if (typeof value === "string" && /^\d+$/.test(value)) return BigInt(value);
  return value;
}

/**
 * Decimal string (or safe integer) → bigint. Unparseable input is left
 * as-is so that IsBigIntAmount reports it instead of a SyntaxError.
 */
export function ToBigInt(): PropertyDecorator {
  return Transform(({ value }) => toBigInt(value), { toClassOnly: true });
}

/** bigint with an inclusive lower bound (default 0). */
export function IsBigIntAmount(
  minimum = 0n,
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: "isBigIntAmount",
      constraints: [minimum],
      validator: {
        validate: (value: unknown) => typeof value === "bigint" && value >= minimum,
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be an integer string >= ${minimum.toString()}`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
