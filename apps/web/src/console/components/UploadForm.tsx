import { useState, type ChangeEvent } from "react";
import { Button, Flex, Text } from "@radix-ui/themes";
import { UploadIcon } from "@radix-ui/react-icons";
import { ALLOWED_UPLOAD_EXTENSIONS } from "@foundry-console/types";

export const UPLOAD_ACCEPT = ALLOWED_UPLOAD_EXTENSIONS.map((extension) => `.${extension}`).join(",");

interface UploadFormProps {
  disabled: boolean;
  isUploading: boolean;
  onUpload: (file: File) => void;
}

export function UploadForm({ disabled, isUploading, onUpload }: UploadFormProps): JSX.Element {
  const [file, setFile] = useState<File | null>(null);

  const handleChange = (event: ChangeEvent<HTMLInputElement>) => {
    setFile(event.target.files?.[0] ?? null);
  };

  return (
    <Flex direction="column" gap="2">
      <Text as="label" size="2" weight="medium" htmlFor="agent-file-upload">
        Upload a file to attach/persist in Code Interpreter
      </Text>
      <input
        id="agent-file-upload"
        type="file"
        accept={UPLOAD_ACCEPT}
        disabled={disabled || isUploading}
        onChange={handleChange}
      />
      {file ? (
        <Button
          variant="solid"
          loading={isUploading}
          disabled={disabled}
          onClick={() => onUpload(file)}
        >
          <UploadIcon />
          Upload and persist (overwrite by filename)
        </Button>
      ) : null}
    </Flex>
  );
}
