export const SOURCE_MAKEFILE = `.PHONY: test lint deploy

PYTHON := python3
DEPLOY_TARGET := production

test:
\t$(PYTHON) -m pytest

lint:
\t$(PYTHON) -m ruff check .

deploy:
\t./deploy.sh $(DEPLOY_TARGET)
`;

export const TARGET_MAKEFILE = `.PHONY: test

PYTHON := python3

test:
\t$(PYTHON) -m pytest --cov
`;
